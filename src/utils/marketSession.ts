export interface SessionWindow {
  timezone: string;
  open: string;
  close: string;
}

interface ZonedClock {
  dateKey: string;
  weekday: string;
  minuteOfDay: number;
}

const formatterCache = new Map<string, Intl.DateTimeFormat>();

const formatterFor = (timezone: string): Intl.DateTimeFormat => {
  const cached = formatterCache.get(timezone);
  if (cached) return cached;
  const formatter = new Intl.DateTimeFormat("en-US", {
    timeZone: timezone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    weekday: "short",
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23"
  });
  formatterCache.set(timezone, formatter);
  return formatter;
};

const parseClockMinutes = (value: string): number => {
  const [hours, minutes] = value.split(":").map((part) => Number(part));
  return (hours ?? 0) * 60 + (minutes ?? 0);
};

const zonedClock = (timestampMs: number, timezone: string): ZonedClock => {
  const parts = formatterFor(timezone).formatToParts(new Date(timestampMs));
  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((entry) => entry.type === type)?.value ?? "";

  return {
    dateKey: `${part("year")}-${part("month")}-${part("day")}`,
    weekday: part("weekday"),
    minuteOfDay: Number(part("hour")) * 60 + Number(part("minute"))
  };
};

/** Trading date (YYYY-MM-DD) of a timestamp in the exchange timezone; VWAP and daily counters reset on change. */
export const sessionKeyOf = (timestampMs: number, timezone: string): string =>
  zonedClock(timestampMs, timezone).dateKey;

export const isWithinSession = (timestampMs: number, window: SessionWindow): boolean => {
  const clock = zonedClock(timestampMs, window.timezone);
  if (clock.weekday === "Sat" || clock.weekday === "Sun") return false;
  return (
    clock.minuteOfDay >= parseClockMinutes(window.open) &&
    clock.minuteOfDay < parseClockMinutes(window.close)
  );
};

/** Minutes left before the session close, or null outside the session. */
export const minutesToSessionClose = (timestampMs: number, window: SessionWindow): number | null => {
  if (!isWithinSession(timestampMs, window)) return null;
  const clock = zonedClock(timestampMs, window.timezone);
  return parseClockMinutes(window.close) - clock.minuteOfDay;
};
