import { SearchPlaceIndexForPositionCommand } from '@aws-sdk/client-location';
import type { SearchPlaceIndexForPositionCommandOutput } from '@aws-sdk/client-location';
import type { GeoPoint, PlaceCandidate, ReverseGeocoderPort } from '@taxi-stream/domain';
import { getLocationClient } from './clients.js';

export interface LocationSender {
  send(
    command: SearchPlaceIndexForPositionCommand,
  ): Promise<SearchPlaceIndexForPositionCommandOutput>;
}

/** Reverse geocoding against one Amazon Location place index. */
export class LocationReverseGeocoder implements ReverseGeocoderPort {
  constructor(
    private readonly placeIndexName: string,
    private readonly client: LocationSender = getLocationClient(),
  ) {}

  async searchPlaces(point: GeoPoint, maxResults: number): Promise<PlaceCandidate[]> {
    const response = await this.client.send(
      new SearchPlaceIndexForPositionCommand({
        IndexName: this.placeIndexName,
        Position: [point.longitude, point.latitude],
        MaxResults: maxResults,
      }),
    );
    const candidates: PlaceCandidate[] = [];
    for (const result of response.Results ?? []) {
      const label = result.Place?.Label;
      if (label) candidates.push({ label });
    }
    return candidates;
  }
}
