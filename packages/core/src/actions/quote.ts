const SAFE_ARG = /^[A-Za-z0-9_\/.:=@%+,-]+$/;

/**
 * Quote one argument for a POSIX shell.
 */
export function quoteArg(arg: string): string {
  if (SAFE_ARG.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

export function quoteArgv(argv: readonly string[]): string {
  return argv.map(quoteArg).join(' ');
}
