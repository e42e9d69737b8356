export { parseTypeExpression, parsePropertySource, tryParsePropertySource, parseBound } from "./parser.ts";
export { validateTypeExpression } from "./validator.ts";
export { validateValue, checkValue } from "./value-validator.ts";
export { formatTypeExpression, toPropertySource } from "./format.ts";
