export { typeName, typeNames } from "./type-name.js";
export { toCanonical, type Json } from "./canonical.js";
export { stringify, quote } from "./value.js";
export { formatMessage } from "./template.js";
