import { buildMessage, registerDecorator, ValidationOptions } from 'class-validator';

/** Require the listed keys of an object value, when set, to hold strings */
export const StringFields = (keys: string[], validationOptions?: ValidationOptions) => {
  return (object: object, propertyName: string): void => {
    registerDecorator({
      name: 'string_fields',
      target: object.constructor,
      propertyName: propertyName,
      constraints: [keys.join(' and ')],
      options: validationOptions,
      validator: {
        validate(value: unknown) {
          if (!(value instanceof Object)) return true;

          for (const [key, field] of Object.entries(value)) {
            if (keys.includes(key) && field !== undefined && field !== null && typeof field !== 'string') {
              return false;
            }
          }
          return true;
        },
        defaultMessage: buildMessage(
          (eachPrefix) => `${eachPrefix}$property must set $constraint1 as strings`,
          validationOptions,
        ),
      },
    });
  };
};
