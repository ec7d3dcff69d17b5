/**
 * Cloud Run regions
 */

export interface RegionOption {
  value: string;
  name: string;
}

export const GCP_REGIONS: RegionOption[] = [
  { value: 'us-central1', name: 'us-central1 (Iowa)' },
  { value: 'us-east1', name: 'us-east1 (South Carolina)' },
  { value: 'us-east4', name: 'us-east4 (Virginia)' },
  { value: 'us-west1', name: 'us-west1 (Oregon)' },
  { value: 'us-west2', name: 'us-west2 (Los Angeles)' },
  { value: 'northamerica-northeast1', name: 'northamerica-northeast1 (Montréal)' },
  { value: 'southamerica-east1', name: 'southamerica-east1 (São Paulo)' },
  { value: 'europe-west1', name: 'europe-west1 (Belgium)' },
  { value: 'europe-west2', name: 'europe-west2 (London)' },
  { value: 'europe-west3', name: 'europe-west3 (Frankfurt)' },
  { value: 'europe-west4', name: 'europe-west4 (Netherlands)' },
  { value: 'asia-east1', name: 'asia-east1 (Taiwan)' },
  { value: 'asia-northeast1', name: 'asia-northeast1 (Tokyo)' },
  { value: 'asia-southeast1', name: 'asia-southeast1 (Singapore)' },
  { value: 'australia-southeast1', name: 'australia-southeast1 (Sydney)' },
];

export const REGION_PATTERN = /^[a-z]+-[a-z]+\d+$/;

export function isKnownRegion(region: string): boolean {
  return GCP_REGIONS.some((r) => r.value === region);
}

export function describeRegion(region: string): string {
  return GCP_REGIONS.find((r) => r.value === region)?.name ?? region;
}
