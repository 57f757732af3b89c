export interface GeoPoint {
  readonly longitude: number;
  readonly latitude: number;
}

export interface PlaceCandidate {
  readonly label: string;
}

export interface ReverseGeocoderPort {
  /** Best matches first. An empty list is a valid answer, not an error. */
  searchPlaces(point: GeoPoint, maxResults: number): Promise<PlaceCandidate[]>;
}
