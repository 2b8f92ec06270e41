export { Contract } from './base';
export { ValidationError, GuardValidationError, ConfigurationError, join_path } from './errors';
export { to_contract } from './normalize';
export { TypeC, AnyC } from './type';
export { NullC, BoolC, StringC, CallableC } from './primitives';
export { NumericC, IntC, FloatC, NumberC } from './number';
export { EmailC, IsoDateC, EMAIL_RE } from './format';
export { EnumC } from './enum';
export { CallC, type Predicate } from './call';
export { OrC, either } from './or';
export { ListC } from './list';
export { DictC, WILDCARD } from './dict';
export { MappingC } from './mapping';
export { ForwardC } from './forward';
