/**
 * Encode `value` as a JavaScript string literal, quotes included.
 *
 * JSON escaping covers quotes, backslashes and control characters; U+2028 and
 * U+2029 are escaped as well since older engines treat them as line terminators.
 */
export function toScriptLiteral(value: string): string {
    return JSON.stringify(value).replace(/\u2028/g, "\\u2028").replace(/\u2029/g, "\\u2029");
}
