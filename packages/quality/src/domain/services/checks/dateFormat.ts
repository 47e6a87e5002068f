type DateToken = 'YYYY' | 'MM' | 'DD' | 'HH' | 'mm' | 'ss';

const TOKENS: readonly DateToken[] = ['YYYY', 'MM', 'DD', 'HH', 'mm', 'ss'];

export interface CompiledDateFormat {
  readonly format: string;
  readonly regex: RegExp;
  readonly tokens: readonly DateToken[];
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Build a matcher for a format such as `YYYY-MM-DD HH:mm:ss`. Characters other than tokens match literally. */
export function compileDateFormat(format: string): CompiledDateFormat {
  let source = '';
  const tokens: DateToken[] = [];
  let i = 0;
  while (i < format.length) {
    const token = TOKENS.find((t) => format.startsWith(t, i));
    if (token) {
      source += token === 'YYYY' ? '(\\d{4})' : '(\\d{2})';
      tokens.push(token);
      i += token.length;
    } else {
      source += escapeRegExp(format.charAt(i));
      i += 1;
    }
  }
  return { format, regex: new RegExp(`^${source}$`), tokens };
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/** `true` when the text matches the format and names a real calendar instant. */
export function matchesDateFormat(text: string, compiled: CompiledDateFormat): boolean {
  const match = compiled.regex.exec(text);
  if (!match) return false;

  const parts: Partial<Record<DateToken, number>> = {};
  compiled.tokens.forEach((token, index) => {
    parts[token] = Number(match[index + 1]);
  });

  const year = parts.YYYY ?? 2000;
  const month = parts.MM ?? 1;
  const day = parts.DD ?? 1;
  if (month < 1 || month > 12) return false;
  if (day < 1 || day > daysInMonth(year, month)) return false;
  if ((parts.HH ?? 0) > 23) return false;
  if ((parts.mm ?? 0) > 59) return false;
  return (parts.ss ?? 0) <= 59;
}
