export const mean = (values: number[]): number => {
  if (values.length === 0) return 0;
  return values.reduce((acc, value) => acc + value, 0) / values.length;
};

export const clamp = (value: number, low: number, high: number): number => {
  return Math.max(low, Math.min(high, value));
};

export const roundTo = (value: number, decimals: number): number => {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
};

export const roundToTick = (price: number, tickSize: number): number => {
  if (tickSize <= 0) return price;
  const decimals = Math.max(0, Math.ceil(-Math.log10(tickSize)));
  return roundTo(Math.round(price / tickSize) * tickSize, decimals);
};
