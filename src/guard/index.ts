export { guard, collect_args } from './guard';
export type { GuardSpec, Guarded } from './guard';
