/**
 * Countries monitored when COUNTRIES is not set, with approximate map
 * centroids ([lat, lon]) for clients that plot results.
 */

export const DEFAULT_COUNTRIES = ['Ukraine', 'Moldova', 'Syria', 'Lebanon', 'Israel', 'Libya'] as const;

export const COUNTRY_COORDINATES: Record<string, [number, number]> = {
  Ukraine: [49.0, 31.0],
  Moldova: [47.4, 28.5],
  Syria: [35.0, 38.0],
  Lebanon: [33.8, 35.8],
  Israel: [31.5, 34.8],
  Libya: [27.0, 17.0],
};
