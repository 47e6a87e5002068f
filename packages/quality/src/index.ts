// Rule model
export type {
  Rule,
  RuleCheck,
  ComparisonOperator,
  NotNullRateRule,
  MinRowsRule,
  ExpectedCountRule,
  RangeRule,
  AllowedValuesRule,
  PatternRule,
  TypeRule,
  UniqueRule,
  DateFormatRule,
  CrossFieldRule,
  RequiredColumnsRule,
  NotNullRule,
} from './domain/model/Rule.js';
export { CHECK_KINDS, ruleColumns, ruleIdOf } from './domain/model/Rule.js';
export type { RuleSet } from './domain/model/RuleSet.js';
export { requiredColumnsOf } from './domain/model/RuleSet.js';

// Validation
export { Validator, validate, passingRecords, isBatchLevel } from './domain/services/Validator.js';
export type { ValidateOptions, ValidatorOptions } from './domain/services/Validator.js';
export { coercesTo } from './domain/services/checks/consistency.js';
export { compileDateFormat, matchesDateFormat } from './domain/services/checks/dateFormat.js';

// Configuration
export { parseRuleSetConfig, loadRuleSetConfigFile, ruleSetFor } from './infrastructure/config/RuleSetConfig.js';
export type { RuleSetConfig } from './infrastructure/config/RuleSetConfig.js';
