import { typeName } from "./type-name.js";
import { quote, stringify } from "./value.js";

// %v %s value, %d number, %q quoted string, %T type name, %#v source form
const VERB = /%(#?)([vsdqT%])/g;

function formatNumber(value: unknown): string {
  if (typeof value === "number" || typeof value === "bigint") {
    return String(value);
  }
  if (typeof value === "symbol") {
    return value.toString();
  }
  return String(Number(value));
}

function formatArg(verb: string, sharp: string, arg: unknown): string {
  switch (verb) {
    case "v":
      return sharp ? quote(arg) : stringify(arg);
    case "d":
      return formatNumber(arg);
    case "q":
      return JSON.stringify(stringify(arg));
    case "T":
      return typeName(arg);
    default:
      return stringify(arg);
  }
}

/**
 * Argument as its verb asks, or a placeholder naming its type when the
 * value throws while being rendered (a throwing getter or valueOf)
 */
function renderArg(verb: string, sharp: string, arg: unknown): string {
  try {
    return formatArg(verb, sharp, arg);
  } catch {
    return `[unprintable ${typeName(arg)}]`;
  }
}

/**
 * Render a printf-style template. A verb without a matching argument is left
 * as written; arguments without a verb are appended, space separated.
 */
export function formatMessage(template: string, args: readonly unknown[]): string {
  let next = 0;
  const rendered = template.replace(VERB, (match: string, sharp: string, verb: string) => {
    if (verb === "%") {
      return sharp ? match : "%";
    }
    if (next >= args.length) {
      return match;
    }
    return renderArg(verb, sharp, args[next++]);
  });

  const extra = args.slice(next).map((arg) => renderArg("v", "", arg));
  return extra.length > 0 ? [rendered, ...extra].join(" ") : rendered;
}
