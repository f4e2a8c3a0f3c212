const SHORT_DATE_REGEX = /^\d{2}\/\d{2}\/\d{2}$/;
const DECIMAL_REGEX = /^([+-]?)(\d*)(?:\.(\d*))?$/;
const CODE_FENCE_REGEX = /^\s*```[\w-]*\s*$/;

export function parseAmountToCents(input: string): number {
  const cleaned = input.replace(/\u00A0/g, " ").trim().replace(/,/g, "");
  const match = cleaned.match(DECIMAL_REGEX);
  if (!match || !/\d/.test(cleaned)) {
    throw new Error(`Invalid amount: ${input}`);
  }
  const [, sign, whole, fraction = ""] = match;
  const digits = fraction.padEnd(3, "0");
  let cents = Number(whole || "0") * 100 + Number(digits.slice(0, 2));
  if (Number(digits[2]) >= 5) {
    cents += 1;
  }
  if (!Number.isSafeInteger(cents)) {
    throw new Error(`Amount out of range: ${input}`);
  }
  if (cents === 0) return 0;
  return sign === "-" ? -cents : cents;
}

export function formatCents(cents: number, grouping = false): string {
  const sign = cents < 0 ? "-" : "";
  const abs = Math.abs(cents);
  const whole = Math.floor(abs / 100).toString();
  const fraction = `${abs % 100}`.padStart(2, "0");
  const grouped = grouping
    ? whole.replace(/\B(?=(\d{3})+(?!\d))/g, ",")
    : whole;
  return `${sign}${grouped}.${fraction}`;
}

export function isShortDate(input: string): boolean {
  return SHORT_DATE_REGEX.test(input);
}

export function stripCodeFences(text: string): string {
  return text
    .split(/\r?\n/)
    .filter((line) => !CODE_FENCE_REGEX.test(line))
    .join("\n");
}
