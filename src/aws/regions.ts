/**
 * Region code to Price List `location` attribute.
 * GetProducts filters on the display name, not the region code.
 */
export const REGION_LOCATIONS: Readonly<Record<string, string>> = Object.freeze({
    'us-east-1': 'US East (N. Virginia)',
    'us-east-2': 'US East (Ohio)',
    'us-west-1': 'US West (N. California)',
    'us-west-2': 'US West (Oregon)',
    'eu-west-1': 'Europe (Ireland)',
    'eu-west-2': 'Europe (London)',
    'eu-west-3': 'Europe (Paris)',
    'eu-central-1': 'Europe (Frankfurt)',
    'eu-north-1': 'Europe (Stockholm)',
    'ap-southeast-1': 'Asia Pacific (Singapore)',
    'ap-southeast-2': 'Asia Pacific (Sydney)',
    'ap-northeast-1': 'Asia Pacific (Tokyo)',
    'ap-northeast-2': 'Asia Pacific (Seoul)',
    'ap-south-1': 'Asia Pacific (Mumbai)',
    'ca-central-1': 'Canada (Central)',
    'sa-east-1': 'South America (Sao Paulo)',
});

export function regionToLocation(region: string): string | undefined {
    return Object.hasOwn(REGION_LOCATIONS, region) ? REGION_LOCATIONS[region] : undefined;
}

export function listRegions(): Array<{ region: string; location: string }> {
    return Object.entries(REGION_LOCATIONS).map(([region, location]) => ({ region, location }));
}
