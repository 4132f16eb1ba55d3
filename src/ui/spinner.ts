import ora, { type Ora } from 'ora';

export function startSpinner(text: string): Ora {
  return ora({
    text,
    color: 'cyan',
  }).start();
}

export function successSpinner(spinner: Ora, text: string): void {
  spinner.succeed(text);
}

export function failSpinner(spinner: Ora, text: string): void {
  spinner.fail(text);
}

export function warnSpinner(spinner: Ora, text: string): void {
  spinner.warn(text);
}
