import type { Entry } from '../entry.js';
import type { SchemaError } from '../errors.js';
import type { Result } from '../result.js';
import { OK_VOID, err } from '../result.js';
import type { SchemaValidator } from '../types.js';

/** Must-attributes of each known object class. */
export type SchemaClasses = Readonly<Record<string, readonly string[]>>;

export interface SchemaValidatorConfig {
  classes: SchemaClasses;
}

export const ATTRIBUTE_NAME_PATTERN = /^[a-z][a-z0-9_]*$/;

export const DEFAULT_SCHEMA_CLASSES: SchemaClasses = {
  object: [],
  extensibleobject: [],
  account: ['name', 'displayname'],
  person: ['name', 'displayname'],
  group: ['name'],
  application: ['name'],
};

/**
 * Reference validator. Checks run in a fixed order and the first failure is
 * reported: attribute names, empty value lists, class presence, known
 * classes, then each class's must-attributes.
 */
export function createSchemaValidator(config: SchemaValidatorConfig = { classes: DEFAULT_SCHEMA_CLASSES }): SchemaValidator {
  const { classes } = config;

  return {
    validate(entry: Entry): Result<void, SchemaError> {
      for (const [name, values] of entry.attrs) {
        if (!ATTRIBUTE_NAME_PATTERN.test(name)) return err({ kind: 'InvalidAttribute' });
        if (values.length === 0) return err({ kind: 'InvalidAttributeSyntax' });
      }

      const entryClasses = entry.attrs.get('class') ?? [];
      if (entryClasses.length === 0) return err({ kind: 'MissingMustAttribute', attr: 'class' });

      for (const className of entryClasses) {
        const must = Object.hasOwn(classes, className) ? classes[className] : undefined;
        if (must === undefined) return err({ kind: 'InvalidClass' });
        for (const attr of must) {
          if (!entry.attrs.has(attr)) return err({ kind: 'MissingMustAttribute', attr });
        }
      }

      return OK_VOID;
    },
  };
}
