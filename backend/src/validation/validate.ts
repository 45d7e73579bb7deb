import { ValidationError, type AnyObjectSchema, type InferType } from "yup";

import { validationFailed } from "../errors/app-error";

export async function validate<S extends AnyObjectSchema>(
  schema: S,
  input: unknown,
): Promise<InferType<S>> {
  try {
    return await schema.validate(input ?? {}, { abortEarly: false, stripUnknown: true });
  } catch (err) {
    if (err instanceof ValidationError) {
      throw validationFailed(err.errors);
    }
    throw err;
  }
}
