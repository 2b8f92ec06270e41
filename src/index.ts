export * from './contracts';
export { guard, collect_args } from './guard';
export type { GuardSpec, Guarded } from './guard';
export { compile } from './compiler';
export { run_check } from './engine';
export { parse_definition } from './schema';
export type { ContractNodeType, DefinitionDocumentType } from './schema';
export type * from './types';
