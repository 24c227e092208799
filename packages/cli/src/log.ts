export function log(message: string) {
  process.stderr.write(`[ucsc-recipes] ${message}\n`);
}
