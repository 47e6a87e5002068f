export const ChunkStatus = {
  PENDING: 'PENDING',
  WRITING: 'WRITING',
  COMMITTED: 'COMMITTED',
  ROLLED_BACK: 'ROLLED_BACK',
} as const;

export type ChunkStatus = (typeof ChunkStatus)[keyof typeof ChunkStatus];
