export function normalizeArgv(rawArgv: string[]): string[] {
  // `npm start -- -- <args>` and some wrappers leave a bare separator first
  if (rawArgv[2] === '--') {
    return [rawArgv[0], rawArgv[1], ...rawArgv.slice(3)];
  }
  return rawArgv;
}
