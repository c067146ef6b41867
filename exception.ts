/**
 * Formatting of errors for logs: name, message and stack of an error and every error in its
 * `cause` chain, on a single entry.
 *
 * @module
 */

/**
 * Builds a detailed description of `error`.
 *
 * The description starts with `<name>: <message>`, followed by the stack frames on the lines
 * below when the runtime captured any. With `includeCauses`, each error of the `cause` chain is
 * appended in turn as ` [Cause (<depth>): <description>]`. Causes that are not `Error`s are
 * described with `String()`.
 *
 * @example
 * ```ts
 * import { detailMessage } from "./exception.ts"
 *
 * try {
 *   await readConfig();
 * } catch (error) {
 *   logger.error(detailMessage(error));
 *   // Error: config unreadable
 *   //     at readConfig (config.ts:12:11) [Cause (1): Error: ENOENT: no such file ...]
 * }
 * ```
 */
export function detailMessage(error: unknown, includeCauses = true): string {
  let detail = describe(error);
  if (!includeCauses) return detail;

  const seen = new Set<unknown>([error]);
  let depth = 0;
  let current = error;
  while (current instanceof Error && current.cause !== undefined && !seen.has(current.cause)) {
    current = current.cause;
    seen.add(current);
    depth++;
    detail += ` [Cause (${depth}): ${describe(current)}]`;
  }

  return detail;
}

function describe(error: unknown): string {
  if (!(error instanceof Error)) return String(error);

  const header = `${error.name}: ${error.message}`;
  const frames = stackFrames(error, header);
  return frames ? `${header}\n${frames}` : header;
}

// V8 stacks repeat the header on their first line(s); keep only the frames below it.
function stackFrames(error: Error, header: string): string {
  const stack = error.stack;
  if (!stack) return "";

  const body = stack.startsWith(header) ? stack.slice(header.length) : stack;
  return body.replace(/^\r?\n/, "").trimEnd();
}
