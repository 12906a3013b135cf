/**
 * Runtime companions of the built-in macros.
 *
 * Code that calls the macros type-checks against these declarations; after
 * expansion only `println` is still referenced. The bodies run only when a
 * file is executed without the expansion pass.
 */

/** Target of expanded `warn` calls */
export function println(message: string): void {
  console.log(message);
}

export function warn(condition: unknown, message: unknown): void {
  if (!condition) {
    println(`<unknown location>: ${String(message)}`);
  }
}

export function debugOnly(fn: () => void): void {
  fn();
}

export function here(): string {
  return "<unknown location>";
}

export function stringify(value: unknown): string {
  return String(value);
}
