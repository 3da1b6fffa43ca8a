export const nowIso = (): string => new Date().toISOString();

export const minutesBetween = (fromIso: string, toMs: number): number => {
  const from = new Date(fromIso).getTime();
  return (toMs - from) / (1000 * 60);
};

export const floorToInterval = (epochMs: number, intervalMs: number): number =>
  Math.floor(epochMs / intervalMs) * intervalMs;
