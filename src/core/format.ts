import { format } from "node:util";
import { errorMessage } from "../errors.js";

/**
 * Expand a printf-style template (`%s`, `%d`, `%j`, `%o`, ... as
 * `util.format` understands them). A call without arguments takes the
 * template literally, so a stray `%` in a plain message is left alone.
 * An argument that fails to convert yields the raw template with the
 * failure appended.
 */
export function formatMessage(template: string, args: readonly unknown[]): string {
  if (args.length === 0) return template;
  try {
    return format(template, ...args);
  } catch (err) {
    return `${template} (formatting failed: ${errorMessage(err)})`;
  }
}
