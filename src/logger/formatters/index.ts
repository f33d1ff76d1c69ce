export { BaseFormatter } from './base';
export { JsonFormatter, type JsonFormatterConfig } from './json';
export { PrettyFormatter, type PrettyFormatterConfig } from './pretty';
