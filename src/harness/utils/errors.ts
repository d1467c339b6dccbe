function escapeRegex(string: string) {
  return string.replace(/[-/\\^$*+?.()|[\]{}]/g, '\\$&');
}

const addLineNumbers = (value: string, errors: ValidationError[]): void => {
  const rows = value.split('\n');
  const total_rows = rows.length;
  for (const error of errors) {
    // YAML sequences are written as `- item`, so array indexes never appear as keys
    const keys = error.path.split('.').filter(key => !/^\d+$/.test(key));
    let pattern = '(.*?)' + keys.map((key) => `${escapeRegex(key)}:`).join('(.*?)');

    const target_value = `${error.value ?? ''}`.split('\n')[0];
    if (!error.invalid_key && target_value) {
      pattern += `(.*?)${escapeRegex(target_value)}`;
    }

    const exp = new RegExp(pattern, 's');
    const matches = exp.exec(value);
    if (matches) {
      const match = matches[0];
      const remaining_rows = value.replace(match, '').split('\n');
      const target_row = total_rows - remaining_rows.length;
      const end_row = rows[target_row];
      if (end_row === undefined) {
        continue;
      }

      const end_length = (remaining_rows[0]?.length || 0);

      if (error.invalid_key || !target_value) {
        error.start = {
          row: target_row + 1,
          column: (end_row.length - end_row.trimStart().length) + 1,
        };
      } else {
        error.start = {
          row: target_row + 1,
          column: (end_row.length - (target_value.length + (end_length ? end_length - 1 : 0))),
        };
      }
      error.end = {
        row: target_row + 1,
        column: end_row.length - end_length,
      };
    }
  }
};

export class HarnessError extends Error { }

export interface ValidationErrorPosition {
  row: number;
  column: number;
}

export class ValidationError {
  scenario: string;
  path: string;
  message: string;
  value?: unknown;
  start?: ValidationErrorPosition;
  end?: ValidationErrorPosition;
  invalid_key: boolean;

  constructor(data: { scenario: string, path: string; message: string; value?: unknown, invalid_key?: boolean }) {
    this.scenario = data.scenario;
    this.path = data.path;
    this.message = data.message;
    this.value = data.value;
    this.invalid_key = data.invalid_key || false;
  }
}

export class ValidationErrors extends HarnessError {
  errors: ValidationError[];
  file?: { path: string; contents: string };

  constructor(errors: ValidationError[], file?: { path: string; contents: string }) {
    super();

    this.name = `ValidationErrors`;
    if (file) {
      addLineNumbers(file.contents, errors);

      let first_error: ValidationError | undefined;
      for (const error of errors) {
        if (!first_error || (first_error.start?.row || 1) > (error.start?.row || 1)) {
          first_error = error;
        }
      }

      this.name += `\nfile: ${file.path}:${first_error?.start?.row || 1}:${first_error?.start?.column || 1}`;
    }

    this.message = JSON.stringify(errors, null, 2);
    this.errors = errors;
    this.file = file;
  }
}
