import Ajv, { type ErrorObject, type ValidateFunction } from 'ajv';
import { createLogger } from '@toolrelay/logger';

const log = createLogger('argument-validator');

export type ValidationResult = { valid: true } | { valid: false; issues: string[] };

const formatError = (error: ErrorObject): string => `${error.instancePath || '/'} ${error.message ?? 'is invalid'}`;

/**
 * Validates tool arguments against the input schema a server advertised.
 *
 * Compiled validators are cached per schema object; a capability refresh
 * produces new schema objects and therefore recompiles. Compiled schemas are
 * not registered by `$id`, so tools may repeat one. Schemas Ajv cannot
 * compile are logged once and accept any arguments.
 */
export class ArgumentValidator {
  private readonly ajv = new Ajv({ allErrors: true, strict: false, addUsedSchema: false });
  private readonly cache = new WeakMap<object, ValidateFunction | null>();

  validate(toolName: string, schema: Record<string, unknown>, args: unknown): ValidationResult {
    const validator = this.compile(toolName, schema);
    if (!validator || validator(args)) {
      return { valid: true };
    }
    return { valid: false, issues: (validator.errors ?? []).map(formatError) };
  }

  private compile(toolName: string, schema: Record<string, unknown>): ValidateFunction | null {
    const cached = this.cache.get(schema);
    if (cached !== undefined) {
      return cached;
    }

    let validator: ValidateFunction | null;
    try {
      // The meta-schema reference is dropped: servers declare drafts Ajv's default instance does not bundle.
      const { $schema: _metaSchema, ...body } = schema;
      validator = this.ajv.compile(body);
    } catch (error) {
      log.warn('Skipping argument validation: input schema does not compile', error, { toolName });
      validator = null;
    }
    this.cache.set(schema, validator);
    return validator;
  }
}
