import { describe, expect, it } from "vitest";

import { getInstrumentMeta, getPipSize, pipValuePerUnit, priceToPips, roundPrice } from "./instruments";

describe("instruments", () => {
  it("uses a 0.01 pip for JPY quotes and 0.0001 otherwise", () => {
    expect(getPipSize("USD_JPY")).toBe(0.01);
    expect(getPipSize("EUR_USD")).toBe(0.0001);
    expect(getInstrumentMeta("usd_jpy").displayPrecision).toBe(3);
    expect(getInstrumentMeta("EUR_USD").displayPrecision).toBe(5);
  });

  it("rejects malformed instrument names", () => {
    expect(() => getPipSize("EURUSD")).toThrow("Invalid instrument: EURUSD");
  });

  it("prices a pip per unit in the account currency", () => {
    expect(pipValuePerUnit(getInstrumentMeta("EUR_USD"), 1.1, "USD")).toBe(0.0001);
    expect(pipValuePerUnit(getInstrumentMeta("USD_JPY"), 150, "USD")).toBeCloseTo(0.01 / 150, 12);
  });

  it("measures signed pips to a tenth of a pip", () => {
    expect(priceToPips(1.1, 1.104, 0.0001)).toBe(40);
    expect(priceToPips(1.104, 1.1023, 0.0001)).toBe(-17);
    expect(priceToPips(150, 149.855, 0.01)).toBe(-14.5);
  });

  it("rounds prices to the display precision", () => {
    expect(roundPrice(1.0980000000000001, 5)).toBe(1.098);
    expect(roundPrice(149.85549, 3)).toBe(149.855);
  });
});
