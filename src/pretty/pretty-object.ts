import { inspect } from 'node:util';

import { isArrayOf, isString } from '../utils/type-guards';

const MISSING_FIELD = '??';

const FIELD_PLACEHOLDER = /\{([^{}]+)\}/g;

const isFieldList = isArrayOf(isString);

/**
 * Field templates per class. `false` marks a class that declares no
 * `prettyFields`; subclasses get their own entry.
 */
const templateCache = new WeakMap<object, string | false>();

function buildTemplate(fields: readonly string[]): string {
  return fields.map(field => `${field}={${field}}`).join(', ');
}

function templateFor(owner: object): string | false {
  const cached = templateCache.get(owner);
  if (cached !== undefined) return cached;

  const fields: unknown = Reflect.get(owner, 'prettyFields');
  const template = isFieldList(fields) ? buildTemplate(fields) : false;
  templateCache.set(owner, template);
  return template;
}

/**
 * Renders one field: `util.inspect` of its value, `??` when the field is
 * absent or holds `undefined` (an optional class field left unset), or the
 * error text when reading it throws.
 */
function renderField(instance: object, field: string): string {
  try {
    if (!Reflect.has(instance, field)) return MISSING_FIELD;
    const value: unknown = Reflect.get(instance, field);
    return value === undefined ? MISSING_FIELD : inspect(value);
  } catch (error) {
    return String(error);
  }
}

/**
 * Base class whose string form lists selected fields.
 *
 * Subclasses name the fields to show in `static prettyFields`; without a
 * list, the instance's own enumerable properties are shown.
 *
 * ```ts
 * class Point extends PrettyObject {
 *   static prettyFields = ['x', 'y'];
 *   constructor(readonly x: number, readonly y: number) { super(); }
 * }
 *
 * String(new Point(1, 2)); // '[object Point x=1, y=2]'
 * ```
 *
 * The field list is read once per class (see {@link PrettyObject.getPrettyFields});
 * changing `prettyFields` afterwards has no effect.
 */
export class PrettyObject {
  static prettyFields?: readonly string[];

  /**
   * The cached field template of this class, e.g. `"x={x}, y={y}"`, or
   * `false` when the class declares no `prettyFields`.
   */
  static getPrettyFields(this: object): string | false {
    return templateFor(this);
  }

  get [Symbol.toStringTag](): string {
    const className = this.constructor.name;
    const template =
      templateFor(this.constructor) || buildTemplate(Object.keys(this));
    if (template === '') return className;

    const body = template.replace(FIELD_PLACEHOLDER, (_placeholder, field: string) =>
      renderField(this, field)
    );
    return `${className} ${body}`;
  }

  /**
   * `[object ClassName field=value, …]`; never throws for a field.
   */
  repr(): string {
    return Object.prototype.toString.call(this);
  }

  toString(): string {
    return this.repr();
  }

  [inspect.custom](): string {
    return this.repr();
  }
}
