/**
 * Algorithm notation parser
 *
 * Grammar:
 *   alg    := item*
 *   item   := (move | "(" alg ")") suffix
 *   move   := [URFDLB] layers? | [MES] layers? | [XYZxyz]
 *   layers := "[" int (":" int)? "]"
 *   suffix := int? "'"?
 */

import { AlgParseError } from "../errors.js";
import { isFaceName, isSliceName, type WholeAxisName } from "../topo/topology.js";
import { type Alg, type LayerRange, face, layerRange, seq, slice, whole } from "./alg.js";

class Parser {
  private _pos = 0;

  constructor(private readonly _text: string) {}

  parse(): Alg {
    const algs = this._parseSequence();
    this._skipSpace();
    if (this._pos < this._text.length) {
      throw new AlgParseError(`Unexpected '${this._text[this._pos]}'`, this._pos);
    }
    return algs.length === 1 ? algs[0] : seq(...algs);
  }

  private _parseSequence(): Alg[] {
    const algs: Alg[] = [];
    for (;;) {
      this._skipSpace();
      const ch = this._peek();
      if (ch === undefined || ch === `)`) {
        return algs;
      }
      algs.push(this._parseItem());
    }
  }

  private _parseItem(): Alg {
    const start = this._pos;
    const ch = this._next();
    if (ch === `(`) {
      const inner = this._parseSequence();
      if (this._next() !== `)`) {
        throw new AlgParseError(`Missing ')'`, this._pos);
      }
      return { kind: `seq`, algs: inner, count: this._parseSuffix() };
    }
    if (ch !== undefined && isFaceName(ch)) {
      const layers = this._parseLayers();
      return face(ch, this._parseSuffix(), layers);
    }
    if (ch !== undefined && isSliceName(ch)) {
      const layers = this._parseLayers();
      return slice(ch, layers, this._parseSuffix());
    }
    const axis = wholeAxisOf(ch);
    if (axis !== null) {
      return whole(axis, this._parseSuffix());
    }
    throw new AlgParseError(`Unknown move '${ch ?? `end of input`}'`, start);
  }

  private _parseLayers(): LayerRange | undefined {
    if (this._peek() !== `[`) {
      return undefined;
    }
    this._pos++;
    const from = this._parseInt();
    let to = from;
    if (this._peek() === `:`) {
      this._pos++;
      to = this._parseInt();
    }
    if (this._next() !== `]`) {
      throw new AlgParseError(`Missing ']'`, this._pos);
    }
    if (from < 1) {
      throw new AlgParseError(`Layer indices are 1-based`, this._pos);
    }
    return layerRange(from, to);
  }

  private _parseSuffix(): number {
    let count = 1;
    if (isDigit(this._peek())) {
      count = this._parseInt();
    }
    if (this._peek() === `'`) {
      this._pos++;
      count = -count;
    }
    return count;
  }

  private _parseInt(): number {
    const start = this._pos;
    while (isDigit(this._peek())) {
      this._pos++;
    }
    if (start === this._pos) {
      throw new AlgParseError(`Expected a number`, start);
    }
    return Number.parseInt(this._text.slice(start, this._pos), 10);
  }

  private _skipSpace(): void {
    while (this._peek() === ` ` || this._peek() === `\t` || this._peek() === `\n`) {
      this._pos++;
    }
  }

  private _peek(): string | undefined {
    return this._pos < this._text.length ? this._text[this._pos] : undefined;
  }

  private _next(): string | undefined {
    const ch = this._peek();
    if (ch !== undefined) {
      this._pos++;
    }
    return ch;
  }
}

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= `0` && ch <= `9`;
}

function wholeAxisOf(ch: string | undefined): WholeAxisName | null {
  switch (ch) {
    case `X`:
    case `x`:
      return `X`;
    case `Y`:
    case `y`:
      return `Y`;
    case `Z`:
    case `z`:
      return `Z`;
    default:
      return null;
  }
}

/**
 * Parse algorithm notation such as `R U R' U'`, `M[2:3]'` or `(R U)3`
 *
 * @throws AlgParseError on malformed input
 */
export function parseAlg(text: string): Alg {
  return new Parser(text).parse();
}
