import type { GeoPoint } from './types';

export const EARTH_RADIUS_KM = 6371;

const toRadians = (degrees: number): number => (degrees * Math.PI) / 180;

/** Great-circle distance in kilometres (haversine). */
export const distanceKm = (from: GeoPoint, to: GeoPoint): number => {
  const dLat = toRadians(to.latitude - from.latitude);
  const dLon = toRadians(to.longitude - from.longitude);
  const a =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(from.latitude)) * Math.cos(toRadians(to.latitude)) * Math.sin(dLon / 2) ** 2;
  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
  return EARTH_RADIUS_KM * c;
};

/**
 * Point reached by travelling `km` due north of `origin`. Fixtures use it to
 * place nodes at a known distance.
 */
export const offsetNorthKm = (origin: GeoPoint, km: number): GeoPoint => ({
  latitude: origin.latitude + (km / EARTH_RADIUS_KM) * (180 / Math.PI),
  longitude: origin.longitude,
});
