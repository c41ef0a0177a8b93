// Shared validation utilities

import type { BoundingBox } from '../types/osm.js';

export function isValidLatitude(lat: number): boolean {
  return lat >= -90 && lat <= 90;
}

export function isValidLongitude(lon: number): boolean {
  return lon >= -180 && lon <= 180;
}

export function isValidCoordinate(lat: number, lon: number): boolean {
  return isValidLatitude(lat) && isValidLongitude(lon);
}

export function isValidBoundingBox(box: BoundingBox): boolean {
  return (
    isValidCoordinate(box.south, box.west) &&
    isValidCoordinate(box.north, box.east) &&
    box.south < box.north &&
    box.west < box.east
  );
}

/**
 * Overpass bbox filter order: south,west,north,east
 */
export function formatOverpassBbox(box: BoundingBox): string {
  return `${box.south},${box.west},${box.north},${box.east}`;
}
