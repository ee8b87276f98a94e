import { ObjectDict } from './collections/object-dict';
import { QDict } from './collections/qdict';
import { QList } from './collections/qlist';
import { enumKeys, enumValues, smartEnum } from './enum/smart-enum';
import { MissingAttributeError, isMissingAttributeError } from './errors';
import { PrettyObject } from './pretty/pretty-object';
import {
  cachedProperty,
  cachedPropertyWith,
  overwriteCachedProperty,
  resetCachedProperty
} from './properties/cached-property';
import { LazyValue, lazyValueWith } from './properties/lazy-value';
import { weakProperty, weakPropertyWith } from './properties/weak-property';

/**
 * Names of the public runtime symbols of this package, in registration order.
 */
export const exportedNames = new QList<string>();

/**
 * The public runtime symbols of this package, keyed by name.
 */
export const exportedSymbols = new ObjectDict();

const publicSymbols = [
  QList,
  QDict,
  ObjectDict,
  MissingAttributeError,
  isMissingAttributeError,
  smartEnum,
  enumKeys,
  enumValues,
  weakProperty,
  weakPropertyWith,
  LazyValue,
  lazyValueWith,
  cachedProperty,
  cachedPropertyWith,
  overwriteCachedProperty,
  resetCachedProperty,
  PrettyObject
];

for (const symbol of publicSymbols) {
  exportedNames.register(exportedSymbols.register(symbol));
}
