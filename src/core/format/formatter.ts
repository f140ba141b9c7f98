// src/core/format/formatter.ts
// Renders values in the current display notation.
//
// si/eng share an engineering mantissa (exponent a multiple of three);
// si swaps the exponent for a scale letter when one exists.
// Integer notations round first and drop the units; exact integers
// render digit for digit.

import { exactInteger, imagPart, realPart, type Notation, type Value } from "../values/value";

export interface FormatState {
  notation: Notation;
  /** Precision for real notations, minimum width for integer ones */
  digits: number;
}

export const DEFAULT_FORMAT: FormatState = { notation: "si", digits: 4 };

/** Units that render before the number, after any sign: "-$20M". */
export const CURRENCY_UNITS: readonly string[] = ["$", "€", "¥", "£", "₩", "₺", "₽", "₹", "Ƀ", "₿"];

const SCALE_LETTERS: ReadonlyMap<number, string> = new Map([
  [12, "T"], [9, "G"], [6, "M"], [3, "k"], [0, ""],
  [-3, "m"], [-6, "µ"], [-9, "n"], [-12, "p"], [-15, "f"], [-18, "a"],
]);

const INTEGER_BASES: Record<string, { radix: number; prefix: string; verilog: boolean }> = {
  hex: { radix: 16, prefix: "0x", verilog: false },
  oct: { radix: 8, prefix: "0o", verilog: false },
  bin: { radix: 2, prefix: "0b", verilog: false },
  "v-hex": { radix: 16, prefix: "'h", verilog: true },
  "v-oct": { radix: 8, prefix: "'o", verilog: true },
  "v-bin": { radix: 2, prefix: "'b", verilog: true },
  "v-dec": { radix: 10, prefix: "'d", verilog: true },
};

// =============================================================================
// Number pieces
// =============================================================================

/** Mantissa/exponent pair with the exponent a multiple of three. */
export function engineering(x: number, digits: number): { mantissa: string; exp: number } {
  const [m, e] = x.toExponential(digits).split("e");
  const exp = parseInt(e, 10);
  const shift = ((exp % 3) + 3) % 3;
  const scaled = Number(m) * 10 ** shift;
  return { mantissa: stripZeros(scaled.toFixed(Math.max(digits - shift, 0))), exp: exp - shift };
}

function stripZeros(s: string): string {
  if (!s.includes(".")) return s;
  return s.replace(/0+$/, "").replace(/\.$/, "");
}

function groupThousands(s: string): string {
  const [whole, frac] = s.split(".");
  const grouped = whole.replace(/\B(?=(\d{3})+(?!\d))/g, ",");
  return frac === undefined ? grouped : `${grouped}.${frac}`;
}

function scientific(x: number, digits: number): string {
  return x.toExponential(digits).replace(/e([+-])(\d)$/, "e$10$2");
}

function integer(n: bigint, notation: Notation, digits: number): string {
  const base = INTEGER_BASES[notation];
  const sign = n < 0n ? "-" : "";
  const body = (n < 0n ? -n : n).toString(base.radix).padStart(digits - sign.length, "0");
  return base.verilog ? `${base.prefix}${sign}${body}` : `${sign}${base.prefix}${body}`;
}

function isIntegerNotation(notation: Notation): boolean {
  return notation in INTEGER_BASES;
}

// =============================================================================
// Formatter
// =============================================================================

export class Formatter {
  private state: FormatState;

  constructor(initial: FormatState = DEFAULT_FORMAT, private readonly spacer = " ") {
    this.state = { ...initial };
  }

  get current(): FormatState {
    return { ...this.state };
  }

  /** Switch notation; without digits the current precision is kept. */
  setNotation(notation: Notation, digits?: number): void {
    this.state = { notation, digits: digits ?? this.state.digits };
  }

  render(v: Value, state: FormatState = this.state): string {
    const { notation, digits } = state;
    const exact = exactInteger(v.n);
    if (exact !== undefined && isIntegerNotation(notation)) return integer(exact, notation, digits);
    if (v.n.tag === "Real") return this.renderReal(v.n.x, v.units, notation, digits);
    return this.renderComplex(realPart(v.n), imagPart(v.n), v.units, notation, digits);
  }

  renderReal(x: number, units: string, notation: Notation, digits: number): string {
    if (Object.is(x, -0)) x = 0;
    if (!Number.isFinite(x)) {
      return this.attach(Number.isNaN(x) ? "nan" : x > 0 ? "inf" : "-inf", "", units);
    }
    if (isIntegerNotation(notation)) return integer(BigInt(Math.round(x)), notation, digits);

    switch (notation) {
      case "si": {
        const { mantissa, exp } = engineering(x, digits);
        const letter = SCALE_LETTERS.get(exp);
        return letter === undefined
          ? this.attach(mantissa, `e${exp}`, units)
          : this.attachScaled(mantissa, letter, units);
      }
      case "eng": {
        const { mantissa, exp } = engineering(x, digits);
        return this.attach(mantissa, exp === 0 ? "" : `e${exp}`, units);
      }
      case "sci":
        return this.attach(scientific(x, digits), "", units);
      default:
        return this.attach(groupThousands(x.toFixed(digits)), "", units);
    }
  }

  // Scale letters prefix the units: "125 mV", "31.416k".
  private attachScaled(mantissa: string, letter: string, units: string): string {
    if (CURRENCY_UNITS.includes(units)) return this.currency(mantissa + letter, units);
    if (!units) return mantissa + letter;
    return `${mantissa}${this.spacer}${letter}${units}`;
  }

  private attach(number: string, suffix: string, units: string): string {
    if (CURRENCY_UNITS.includes(units)) return this.currency(number + suffix, units);
    return units ? `${number}${suffix}${this.spacer}${units}` : number + suffix;
  }

  private currency(number: string, units: string): string {
    return number.startsWith("-") ? `-${units}${number.slice(1)}` : units + number;
  }

  private renderComplex(re: number, im: number, units: string, notation: Notation, digits: number): string {
    const text = (x: number) => this.renderReal(x, units, notation, digits);
    const realText = text(re);
    const imagText = text(im);
    const zero = text(0);
    const one = text(1);
    const unitsText = units ? this.spacer + units : "";

    if (imagText === zero) return realText;
    if (imagText.startsWith("-")) {
      const mag = imagText.slice(1);
      const shown = mag === one ? unitsText.trim() : mag;
      return realText === zero ? `-j${shown}` : `${realText} - j${shown}`;
    }
    const shown = imagText === one ? unitsText : imagText;
    return realText === zero ? `j${shown}` : `${realText} + j${shown}`;
  }
}
