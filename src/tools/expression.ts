// Arithmetic expressions for the calculate tool.
//
// Grammar (lowest to highest precedence):
//   expr   := term (('+' | '-') term)*
//   term   := factor (('*' | '/' | '//') factor)*
//   factor := ('+' | '-') factor | power
//   power  := atom ('**' factor)?
//   atom   := NUMBER | '(' expr ')'
//
// Integers are exact (bigint). `/` always produces a float, `//` floors, and `**`
// with a negative integer exponent produces a float.

export type Num = { kind: 'int'; value: bigint } | { kind: 'float'; value: number };

export class ExpressionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExpressionError';
  }
}

type Token =
  | { type: 'num'; text: string; pos: number }
  | { type: 'op'; text: '+' | '-' | '*' | '/' | '//' | '**' | '(' | ')'; pos: number };

// Integer results estimated wider than this many bits are refused instead of materialised
const MAX_INT_BITS = 400_000n;

function tokenize(src: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < src.length) {
    const c = src[i];
    if (c === ' ') {
      i++;
      continue;
    }
    if ((c >= '0' && c <= '9') || c === '.') {
      const start = i;
      while (i < src.length && ((src[i] >= '0' && src[i] <= '9') || src[i] === '.')) i++;
      tokens.push({ type: 'num', text: src.slice(start, i), pos: start });
      continue;
    }
    const two = src.slice(i, i + 2);
    if (two === '//' || two === '**') {
      tokens.push({ type: 'op', text: two, pos: i });
      i += 2;
      continue;
    }
    if (c === '+' || c === '-' || c === '*' || c === '/' || c === '(' || c === ')') {
      tokens.push({ type: 'op', text: c, pos: i });
      i++;
      continue;
    }
    throw new ExpressionError(`unexpected character '${c}' at column ${i + 1}`);
  }
  return tokens;
}

function parseNumber(tok: { text: string; pos: number }): Num {
  const { text } = tok;
  const dots = text.split('.').length - 1;
  if (dots > 1 || text === '.') {
    throw new ExpressionError(`invalid number '${text}' at column ${tok.pos + 1}`);
  }
  if (dots === 1) return { kind: 'float', value: Number(text) };
  if (text.length > 1 && text.startsWith('0') && /[1-9]/.test(text)) {
    throw new ExpressionError('leading zeros in decimal integer literals are not permitted');
  }
  return { kind: 'int', value: BigInt(text) };
}

function bitLength(n: bigint): bigint {
  const abs = n < 0n ? -n : n;
  return abs === 0n ? 0n : BigInt(abs.toString(2).length);
}

function toFloat(n: Num): number {
  if (n.kind === 'float') return n.value;
  const v = Number(n.value);
  if (!Number.isFinite(v)) throw new ExpressionError('int too large to convert to float');
  return v;
}

const isZero = (n: Num) => (n.kind === 'int' ? n.value === 0n : n.value === 0);

// Float result of an operation on finite operands must stay finite
function float(value: number, ...operands: number[]): Num {
  if (!Number.isFinite(value) && operands.every(Number.isFinite)) {
    throw new ExpressionError('numerical result out of range');
  }
  return { kind: 'float', value };
}

function scale(x: number, exp: number): number {
  let v = x;
  let e = exp;
  while (e > 1000) {
    v *= 2 ** 1000;
    e -= 1000;
  }
  while (e < -1000) {
    v *= 2 ** -1000;
    e += 1000;
  }
  return v * 2 ** e;
}

// n / d rounded once to the nearest double, without converting either operand first
function intRatio(n: bigint, d: bigint): number {
  const negative = (n < 0n) !== (d < 0n);
  const an = n < 0n ? -n : n;
  const ad = d < 0n ? -d : d;
  const safe = BigInt(Number.MAX_SAFE_INTEGER);
  if (an <= safe && ad <= safe) return Number(n) / Number(d);
  // keep 64+ quotient bits; a nonzero remainder becomes a sticky low bit
  const shift = 64n - (bitLength(an) - bitLength(ad));
  const num = shift >= 0n ? an << shift : an;
  const den = shift >= 0n ? ad : ad << -shift;
  let q = num / den;
  if (num % den !== 0n) q |= 1n;
  const v = scale(Number(q), -Number(shift));
  return negative ? -v : v;
}

function add(a: Num, b: Num): Num {
  if (a.kind === 'int' && b.kind === 'int') return { kind: 'int', value: a.value + b.value };
  const x = toFloat(a);
  const y = toFloat(b);
  return float(x + y, x, y);
}

function sub(a: Num, b: Num): Num {
  if (a.kind === 'int' && b.kind === 'int') return { kind: 'int', value: a.value - b.value };
  const x = toFloat(a);
  const y = toFloat(b);
  return float(x - y, x, y);
}

function mul(a: Num, b: Num): Num {
  if (a.kind === 'int' && b.kind === 'int') {
    if (bitLength(a.value) + bitLength(b.value) > MAX_INT_BITS) throw new ExpressionError('result too large');
    return { kind: 'int', value: a.value * b.value };
  }
  const x = toFloat(a);
  const y = toFloat(b);
  return float(x * y, x, y);
}

function div(a: Num, b: Num): Num {
  if (isZero(b)) throw new ExpressionError('division by zero');
  if (a.kind === 'int' && b.kind === 'int') {
    const v = intRatio(a.value, b.value);
    if (!Number.isFinite(v)) throw new ExpressionError('integer division result too large for a float');
    return { kind: 'float', value: v };
  }
  const x = toFloat(a);
  const y = toFloat(b);
  return float(x / y, x, y);
}

function floorDiv(a: Num, b: Num): Num {
  if (isZero(b)) throw new ExpressionError('division by zero');
  if (a.kind === 'int' && b.kind === 'int') {
    let q = a.value / b.value; // truncates toward zero
    if (a.value % b.value !== 0n && (a.value < 0n) !== (b.value < 0n)) q -= 1n;
    return { kind: 'int', value: q };
  }
  const x = toFloat(a);
  const y = toFloat(b);
  return float(Math.floor(x / y), x, y);
}

function pow(a: Num, b: Num): Num {
  if (a.kind === 'int' && b.kind === 'int' && b.value >= 0n) {
    const base = a.value < 0n ? -a.value : a.value;
    if (base > 1n && bitLength(base) * b.value > MAX_INT_BITS) throw new ExpressionError('result too large');
    return { kind: 'int', value: a.value ** b.value };
  }
  const x = toFloat(a);
  const y = toFloat(b);
  if (x === 0 && y < 0) throw new ExpressionError('0.0 cannot be raised to a negative power');
  if (x < 0 && !Number.isInteger(y)) throw new ExpressionError('complex results are not supported');
  return float(x ** y, x, y);
}

function negate(n: Num): Num {
  return n.kind === 'int' ? { kind: 'int', value: -n.value } : { kind: 'float', value: -n.value };
}

class Parser {
  private i = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): Num {
    const value = this.expr();
    const extra = this.tokens[this.i];
    if (extra) this.unexpected(extra);
    return value;
  }

  private peekOp(...ops: string[]): string | undefined {
    const t = this.tokens[this.i];
    if (t && t.type === 'op' && ops.includes(t.text)) return t.text;
    return undefined;
  }

  private unexpected(t: Token): never {
    throw new ExpressionError(`unexpected token '${t.text}' at column ${t.pos + 1}`);
  }

  private expr(): Num {
    let left = this.term();
    let op: string | undefined;
    while ((op = this.peekOp('+', '-'))) {
      this.i++;
      const right = this.term();
      left = op === '+' ? add(left, right) : sub(left, right);
    }
    return left;
  }

  private term(): Num {
    let left = this.factor();
    let op: string | undefined;
    while ((op = this.peekOp('*', '/', '//'))) {
      this.i++;
      const right = this.factor();
      left = op === '*' ? mul(left, right) : op === '/' ? div(left, right) : floorDiv(left, right);
    }
    return left;
  }

  private factor(): Num {
    const op = this.peekOp('+', '-');
    if (op) {
      this.i++;
      const operand = this.factor();
      return op === '-' ? negate(operand) : operand;
    }
    return this.power();
  }

  private power(): Num {
    const base = this.atom();
    if (this.peekOp('**')) {
      this.i++;
      return pow(base, this.factor());
    }
    return base;
  }

  private atom(): Num {
    const t = this.tokens[this.i];
    if (!t) throw new ExpressionError('unexpected end of expression');
    if (t.type === 'num') {
      this.i++;
      return parseNumber(t);
    }
    if (t.text === '(') {
      this.i++;
      const inner = this.expr();
      const close = this.tokens[this.i];
      if (!close) throw new ExpressionError('unexpected end of expression');
      if (close.text !== ')') this.unexpected(close);
      this.i++;
      return inner;
    }
    return this.unexpected(t);
  }
}

export function evaluate(src: string): Num {
  const tokens = tokenize(src);
  if (tokens.length === 0) throw new ExpressionError('empty expression');
  return new Parser(tokens).parse();
}

function padExponent(s: string): string {
  // 1e-5 -> 1e-05, 1e+16 stays
  return s.replace(/e([+-])(\d)$/, (_m, sign: string, digit: string) => `e${sign}0${digit}`);
}

export function formatNum(n: Num): string {
  if (n.kind === 'int') return n.value.toString();
  const v = n.value;
  if (Number.isNaN(v)) return 'nan';
  if (!Number.isFinite(v)) return v > 0 ? 'inf' : '-inf';
  const abs = Math.abs(v);
  if (abs !== 0 && (abs >= 1e16 || abs < 1e-4)) return padExponent(v.toExponential());
  if (Number.isInteger(v)) return `${Object.is(v, -0) ? '-0' : v}.0`;
  return String(v);
}
