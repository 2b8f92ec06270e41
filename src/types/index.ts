export type * from './contract.type';
export type * from './issue.type';
export type * from './compile.type';
