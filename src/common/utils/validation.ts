import chalk from 'chalk';
import { ValidationError, ValidationErrors } from '../../harness/utils/errors';
import type { Dictionary } from './dictionary';

export const prettyValidationErrors = (error: ValidationErrors): void => {
  if (!error.file) {
    console.error(chalk.red(error.name));
    for (const validation_error of error.errors) {
      console.error(chalk.red(`  ${validation_error.path}: ${validation_error.message}`));
    }
    return;
  }

  const errors_row_map: Dictionary<ValidationError> = {};
  let min_row = Infinity;
  let max_row = -Infinity;
  let missing_line_numbers = false;
  for (const validation_error of error.errors) {
    if (validation_error.start && validation_error.end) {
      errors_row_map[validation_error.start.row] = validation_error;
      min_row = Math.min(min_row, validation_error.start.row);
      max_row = Math.max(max_row, validation_error.start.row);
    } else {
      missing_line_numbers = true;
    }
  }

  if (missing_line_numbers) {
    console.error(chalk.red(error.name));
    console.error(chalk.red(error.message));
    return;
  }

  min_row = Math.max(min_row - 4, 0);
  max_row = max_row + 3;

  const res: string[] = [];
  let line_number = min_row + 1;
  const lines = error.file.contents.split('\n').slice(min_row, max_row);
  const max_number_length = `${min_row + lines.length}`.length;
  for (const line of lines) {
    const row_error = errors_row_map[line_number];

    const line_number_space = (max_number_length - `${line_number}`.length);

    let number_line = row_error ? chalk.red('›') + ' ' : '  ';
    number_line += chalk.gray(`${' '.repeat(line_number_space)}${line_number} | `);
    number_line += chalk.cyan(line);
    res.push(number_line);

    if (row_error?.start && row_error?.end) {
      let error_line = chalk.gray(`${' '.repeat(max_number_length + 2)} | `);
      error_line += ' '.repeat(Math.max(row_error.start.column - 1, 0));
      error_line += chalk.red('﹋'.repeat(Math.max(((row_error.end.column - row_error.start.column) + 1) / 2, 1)));
      error_line += ' ';
      error_line += chalk.red(row_error.message);
      res.push(error_line);
    }

    line_number++;
  }

  console.error(chalk.red(error.name));
  console.error(res.join('\n'));
};
