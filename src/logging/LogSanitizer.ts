const NEWLINES = /[\r\n]+/g;
const ANSI_ESCAPES = /\x1B\[[0-9;]*m/g;
const CONTROL_CHARACTERS = /[\x00-\x1F\x7F-\x9F]/g;

export const MAX_LOGGED_LENGTH = 1000;

/**
 * Neutralise request-derived text before it is written to a log line.
 * Newlines, ANSI colour sequences and other control characters are replaced
 * by visible markers so that one request can never forge extra log entries.
 */
export function preventLogInjection(input: string, maxLength: number = MAX_LOGGED_LENGTH): string {
  if (!input) {
    return input;
  }

  let sanitized = input
    .replace(NEWLINES, ' [NEWLINE] ')
    .replace(ANSI_ESCAPES, '[ANSI]')
    .replace(CONTROL_CHARACTERS, (char) => {
      const code = char.charCodeAt(0).toString(16).toUpperCase().padStart(2, '0');
      return `[CTRL-${code}]`;
    });

  if (sanitized.length > maxLength) {
    sanitized = `${sanitized.substring(0, maxLength - 3)}...`;
  }

  return sanitized;
}
