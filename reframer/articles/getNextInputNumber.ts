const INPUT_FILE_PATTERN = /^input(.*)\.(txt|pdf)$/;

/**
 * Next sequential number for `input<N>.txt|pdf` files, given the names
 * already present in the user's folder.
 */
export function getNextInputNumber(existingNames: string[]): number {
  const numbers: number[] = [];
  for (const name of existingNames) {
    const match = INPUT_FILE_PATTERN.exec(name);
    if (!match) continue;
    if (!/^\d+$/.test(match[1])) continue;
    numbers.push(Number(match[1]));
  }
  return numbers.length > 0 ? Math.max(...numbers) + 1 : 1;
}
