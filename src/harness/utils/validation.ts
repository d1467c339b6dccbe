import { ValidationError as ClassValidationError, validateSync } from 'class-validator';
import { ValidationError } from './errors';

/**
 * Flattens the nested errors produced by class-validator into one error per invalid path
 * (e.g. `output.0.expect.data.dependencies.1.name`).
 */
export const flattenValidationErrors = (scenario: string, errors: ClassValidationError[], prefix = ''): ValidationError[] => {
  const flattened: ValidationError[] = [];
  for (const error of errors) {
    const path = prefix ? `${prefix}.${error.property}` : error.property;
    for (const message of Object.values(error.constraints || {})) {
      flattened.push(new ValidationError({
        scenario,
        path,
        message,
        value: error.value instanceof Object ? undefined : error.value,
      }));
    }
    if (error.children?.length) {
      flattened.push(...flattenValidationErrors(scenario, error.children, path));
    }
  }
  return flattened;
};

export const validateInstance = (scenario: string, instance: object, prefix = ''): ValidationError[] => {
  return flattenValidationErrors(scenario, validateSync(instance), prefix);
};
