// OpenStreetMap types for residential building search

export interface BoundingBox {
  south: number;
  north: number;
  west: number;
  east: number;
}

export interface CityBounds extends BoundingBox {
  key: string;
  name: string;
}

export interface Country {
  key: string;
  name: string; // display label, e.g. "🇩🇪 Germany"
  cities: Record<string, CityBounds>;
}

export type OSMElementType = 'node' | 'way' | 'relation';

// Raw element as returned by Overpass with `out center`
export interface OverpassElement {
  type: OSMElementType;
  id: number | string;
  lat?: number;
  lon?: number;
  center?: { lat: number; lon: number };
  tags?: Record<string, string>;
}

export interface BuildingRecord {
  address: string;
  latitude: number;
  longitude: number;
  externalId: number | string;
  buildingType: string;
  levels: string;
}

export const RESIDENTIAL_BUILDING_TYPES = ['residential', 'apartments', 'house'] as const;

export const MISSING_TAG_VALUE = 'N/A';
