export type InstrumentMeta = {
  instrument: string;
  baseCurrency: string;
  quoteCurrency: string;
  pipSize: number;
  displayPrecision: number;
  minUnits: number;
  unitIncrement: number;
};

const INSTRUMENT_PATTERN = /^([A-Z]{3})_([A-Z]{3})$/;

export function parseInstrument(instrument: string): { base: string; quote: string } {
  const match = instrument.trim().toUpperCase().match(INSTRUMENT_PATTERN);
  if (!match) {
    throw new Error(`Invalid instrument: ${instrument}`);
  }
  return { base: match[1], quote: match[2] };
}

export function getPipSize(instrument: string): number {
  return parseInstrument(instrument).quote === "JPY" ? 0.01 : 0.0001;
}

export function getInstrumentMeta(instrument: string, overrides?: { minUnits?: number; unitIncrement?: number }): InstrumentMeta {
  const { base, quote } = parseInstrument(instrument);
  const jpy = quote === "JPY";
  return {
    instrument: `${base}_${quote}`,
    baseCurrency: base,
    quoteCurrency: quote,
    pipSize: jpy ? 0.01 : 0.0001,
    displayPrecision: jpy ? 3 : 5,
    minUnits: overrides?.minUnits ?? 1,
    unitIncrement: overrides?.unitIncrement ?? 1
  };
}

/**
 * Account-currency value of one pip for a single unit.
 * Quote == account: pip size. Base == account: pip size / price.
 * Crosses fall back to the base conversion, which is close enough for sizing.
 */
export function pipValuePerUnit(meta: InstrumentMeta, price: number, accountCurrency: string): number {
  const account = accountCurrency.trim().toUpperCase();
  if (meta.quoteCurrency === account) return meta.pipSize;
  if (!Number.isFinite(price) || price <= 0) return Number.NaN;
  return meta.pipSize / price;
}

/** Signed pip distance from `from` to `to` (positive when `to` is higher). */
export function priceToPips(from: number, to: number, pipSize: number): number {
  return Math.round(((to - from) / pipSize) * 10) / 10;
}

export function roundPrice(price: number, precision: number): number {
  const pow = 10 ** precision;
  return Math.round(price * pow) / pow;
}
