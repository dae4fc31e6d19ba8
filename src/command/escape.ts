// Characters a POSIX shell never treats specially inside a word.
const SAFE_ARGUMENT = /^[A-Za-z0-9_\-.,:/@+=%]+$/;

function quote(token: string): string {
  return `'${token.replace(/'/g, "'\\''")}'`;
}

export function escapeArgument(token: string): string {
  if (token === '') {
    return "''";
  }
  if (SAFE_ARGUMENT.test(token)) {
    return token;
  }
  return quote(token);
}

/**
 * Builds the single command string sent over the exec request. The protocol carries one
 * opaque string, so each token is quoted on its own before joining.
 *
 * A leading unquoted `NAME=value` word is a variable assignment to the shell, so a first
 * token holding `=` is always quoted and runs as the command it names.
 */
export function escapeCommand(tokens: readonly string[]): string {
  return tokens
    .map((token, index) => (index === 0 && token.includes('=') ? quote(token) : escapeArgument(token)))
    .join(' ');
}
