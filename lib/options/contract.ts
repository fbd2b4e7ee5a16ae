import { isValid, parseISO } from "date-fns";

export type OptionType = "call" | "put";

export type Contract = {
  symbol: string;
  expiration: string; // YYYY-MM-DD
  strike: number;
  optionType: OptionType;
};

export type QuoteSnapshot = {
  contractId: string;
  underlyingPrice: number;
  bid: number;
  ask: number;
  last: number | null;
  observedAt: Date;
};

const EXPIRATION_RE = /^\d{4}-\d{2}-\d{2}$/;
const SYMBOL_RE = /^[A-Z][A-Z0-9.]{0,5}$/;
const MS_PER_YEAR = 365 * 24 * 60 * 60 * 1000;

// Options stop trading at the 16:00 ET close; the fixed EST offset keeps expiry a pure function of the date.
const EXPIRY_CLOSE_SUFFIX = "T16:00:00-05:00";

export function normalizeContract(contract: Contract): Contract {
  return {
    symbol: contract.symbol.trim().toUpperCase(),
    expiration: contract.expiration.trim(),
    strike: contract.strike,
    optionType: contract.optionType,
  };
}

export function expiryMoment(expiration: string): Date | null {
  if (!EXPIRATION_RE.test(expiration)) return null;
  const day = parseISO(expiration);
  if (!isValid(day)) return null;
  const moment = parseISO(`${expiration}${EXPIRY_CLOSE_SUFFIX}`);
  return isValid(moment) ? moment : null;
}

/**
 * OCC-style option symbol: root padded to six characters, YYMMDD, C/P, strike x 1000 padded to eight digits.
 * Used as the contract's primary key everywhere.
 */
export function contractId(contract: Contract): string {
  const c = normalizeContract(contract);
  const [year, month, day] = c.expiration.split("-");
  const yymmdd = `${(year ?? "").slice(-2)}${month ?? ""}${day ?? ""}`;
  const side = c.optionType === "call" ? "C" : "P";
  const strike = String(Math.round(c.strike * 1000)).padStart(8, "0");
  return `${c.symbol.padEnd(6, " ")}${yymmdd}${side}${strike}`;
}

export function describeContract(contract: Contract): string {
  const c = normalizeContract(contract);
  return `${c.symbol} ${c.expiration} ${c.strike} ${c.optionType === "call" ? "C" : "P"}`;
}

export function contractIssues(contract: Contract, now: Date = new Date()): string[] {
  const issues: string[] = [];
  const c = normalizeContract(contract);
  if (!SYMBOL_RE.test(c.symbol)) issues.push(`symbol "${contract.symbol}" is not a valid underlying symbol`);
  if (!Number.isFinite(c.strike) || c.strike <= 0) issues.push(`strike must be a positive number (got ${contract.strike})`);
  if (c.optionType !== "call" && c.optionType !== "put") issues.push(`optionType must be "call" or "put"`);
  const expiry = expiryMoment(c.expiration);
  if (!expiry) {
    issues.push(`expiration "${contract.expiration}" is not a valid YYYY-MM-DD date`);
  } else if (expiry.getTime() <= now.getTime()) {
    issues.push(`expiration ${c.expiration} is not in the future`);
  }
  return issues;
}

export function timeToExpiryYears(expiration: string, now: Date): number | null {
  const expiry = expiryMoment(expiration);
  if (!expiry) return null;
  return (expiry.getTime() - now.getTime()) / MS_PER_YEAR;
}
