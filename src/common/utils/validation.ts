import { ValidationError } from 'class-validator';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Flattens nested class-validator errors into `path: message` lines,
 * e.g. `fees[2].venue: venue must be one of the following values: ...`.
 */
export function flattenValidationErrors(
  errors: ValidationError[],
  parentPath = '',
): string[] {
  return errors.flatMap((error) => {
    const propertyPath = parentPath
      ? /^\d+$/.test(error.property)
        ? `${parentPath}[${error.property}]`
        : `${parentPath}.${error.property}`
      : error.property;
    const own = error.constraints
      ? [`${propertyPath}: ${Object.values(error.constraints).join(', ')}`]
      : [];
    return [
      ...own,
      ...flattenValidationErrors(error.children ?? [], propertyPath),
    ];
  });
}
