import { ClassConstructor, plainToInstance } from 'class-transformer';
import { ValidationError, validate } from 'class-validator';
import { JobValidationException } from '../exceptions/job.exceptions';

/**
 * Transforms a plain request into `cls` and validates it.
 *
 * @throws JobValidationException listing every violated constraint
 */
export async function validateDto<T extends object>(
  cls: ClassConstructor<T>,
  plain: object,
): Promise<T> {
  const instance = plainToInstance(cls, plain);
  const errors = await validate(instance, { whitelist: true });

  if (errors.length > 0) {
    throw new JobValidationException(flattenErrors(errors));
  }
  return instance;
}

function flattenErrors(errors: ValidationError[], parentPath = ''): string[] {
  return errors.flatMap((error) => {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map(
      (constraint) => `${path}: ${constraint}`,
    );
    return [...own, ...flattenErrors(error.children ?? [], path)];
  });
}
