import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

export type AjvValidateFn<T> = ((data: unknown) => data is T) & { errors?: unknown };

export type AjvInstance = {
  compile: <T>(schema: unknown) => AjvValidateFn<T>;
  errorsText: (errors: unknown) => string;
};

export type AjvOptions = {
  /** Coerce strings (e.g. env overrides) to the schema's scalar types in place. */
  coerceTypes?: boolean;
};

export function loadAjv(opts: AjvOptions = {}): AjvInstance {
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true, allowUnionTypes: true, coerceTypes: opts.coerceTypes ?? false });
  add(ajv);

  return ajv;
}

/**
 * Compile a schema once and return a checker that reports ajv's error text.
 */
export function createChecker<T>(schema: unknown, opts: AjvOptions = {}): (data: unknown) => { ok: true; value: T } | { ok: false; errors: string } {
  const ajv = loadAjv(opts);
  const validate = ajv.compile<T>(schema);
  return (data) => (validate(data) ? { ok: true, value: data } : { ok: false, errors: ajv.errorsText(validate.errors) });
}
