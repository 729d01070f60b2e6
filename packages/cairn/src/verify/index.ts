export { verify } from './verify';
export type { CorruptionReport, Problem, ReferencePath, VerifyOptions } from './verify';
