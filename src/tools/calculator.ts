import { evaluate, formatNum } from './expression.js';

// Character allow-list checked before parsing. The parser only understands
// arithmetic anyway; the list stays so rejected input keeps its own message.
export const ALLOWED_CHARS = new Set('0123456789+-*/.() ');

export const INVALID_EXPRESSION_MESSAGE = 'Invalid expression. Only basic math operations allowed.';

export function calculate(expression: string): string {
  for (const c of expression) {
    if (!ALLOWED_CHARS.has(c)) return INVALID_EXPRESSION_MESSAGE;
  }
  try {
    return `${expression} = ${formatNum(evaluate(expression))}`;
  } catch (e) {
    return `Calculation error: ${e instanceof Error ? e.message : String(e)}`;
  }
}
