// RefreshInterval: accepted scheduler periods and their length in ms


/** Accepted values, validated at startup */
export const VALID_INTERVALS = ["10min", "30min", "1h", "6h", "12h", "1day"] as const;


export type RefreshInterval = (typeof VALID_INTERVALS)[number];


export function refreshIntervalToMs(interval: RefreshInterval): number {
  const map: Record<RefreshInterval, number> = {
    "10min": 10 * 60 * 1000,
    "30min": 30 * 60 * 1000,
    "1h": 60 * 60 * 1000,
    "6h": 6 * 60 * 60 * 1000,
    "12h": 12 * 60 * 60 * 1000,
    "1day": 24 * 60 * 60 * 1000,
  };
  return map[interval];
}
