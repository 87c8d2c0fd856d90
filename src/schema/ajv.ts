import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

export type AjvValidateFn = ((data: unknown) => boolean) & { errors?: unknown };

export type AjvInstance = {
  compile: (schema: unknown) => AjvValidateFn;
  errorsText: (errors: unknown) => string;
};

/** A compiled schema that narrows the value it accepts. */
export type SchemaGuard<T> = {
  check: (data: unknown) => data is T;
  /** Errors of the last failed `check`. */
  errorsText: () => string;
};

let shared: AjvInstance | null = null;

export async function loadAjv(): Promise<AjvInstance> {
  if (shared) return shared;

  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true });
  add(ajv);

  shared = ajv;
  return ajv;
}

export async function compileGuard<T>(schema: unknown): Promise<SchemaGuard<T>> {
  const ajv = await loadAjv();
  const validate = ajv.compile(schema);
  return {
    check: (data: unknown): data is T => validate(data),
    errorsText: () => ajv.errorsText(validate.errors),
  };
}
