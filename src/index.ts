export { QList } from './collections/qlist';
export { QDict } from './collections/qdict';
export type { MappingSource, QDictInit } from './collections/qdict';
export { ObjectDict } from './collections/object-dict';
export type { UpdateOptions } from './collections/update-options';

export { MissingAttributeError, isMissingAttributeError } from './errors';

export { smartEnum, enumKeys, enumValues } from './enum/smart-enum';
export type {
  EnumSource,
  MemberName,
  MemberValue,
  SmartEnum,
  SmartEnumAccessors
} from './enum/smart-enum';

export { weakProperty, weakPropertyWith } from './properties/weak-property';
export type { WeakPropertyHook } from './properties/weak-property';
export { LazyValue, lazyValueWith } from './properties/lazy-value';
export {
  cachedProperty,
  cachedPropertyWith,
  overwriteCachedProperty,
  resetCachedProperty
} from './properties/cached-property';

export { PrettyObject } from './pretty/pretty-object';

export { exportedNames, exportedSymbols } from './manifest';

export type { Guard } from './utils/type-guards';
export { isNumber, isString } from './utils/type-guards';
export type { Named, EntryPair, PlainObjectRecord } from './types/primitives';
