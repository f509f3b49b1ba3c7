import { GeoCoordinates, ResolvedLocation } from "./types";
import { CodedError, ErrorCode } from "./errors";
import { Geocoder } from "./geocoders/Geocoder";

// Define regex filters to match against location
const filters = {
	gps: /^[-+]?([1-8]?\d(\.\d+)?|90(\.0+)?),\s*[-+]?(180(\.0+)?|((1[0-7]\d)|([1-9]?\d))(\.\d+)?)$/
};

/**
 * Where the forecast location comes from. A search is resolved through a Geocoder, while fixed coordinates are used
 * as they are and reported without a place name.
 */
export type LocationSource =
	| { kind: "search", query: string }
	| { kind: "fixed", coordinates: GeoCoordinates };

/**
 * Parses a "latitude,longitude" pair.
 * @param text The text to parse.
 * @return The coordinates, or undefined if the text is not a valid coordinate pair.
 */
export function parseCoordinates( text: string ): GeoCoordinates | undefined {
	const trimmed = text.trim();
	if ( !filters.gps.test( trimmed ) ) {
		return undefined;
	}

	const split: string[] = trimmed.split( "," );
	return [ parseFloat( split[ 0 ] ), parseFloat( split[ 1 ] ) ];
}

/**
 * Builds the LocationSource for something the user typed. A coordinate pair skips geocoding.
 * @param query A place name or a coordinate pair.
 * @return The LocationSource for the query.
 * @throws CodedError InvalidLocationFormat if the query is empty.
 */
export function locationSourceFromQuery( query: string ): LocationSource {
	const trimmed = query.trim();
	if ( !trimmed ) {
		throw new CodedError( ErrorCode.InvalidLocationFormat, "no location was given" );
	}

	const coordinates = parseCoordinates( trimmed );
	if ( coordinates ) {
		return { kind: "fixed", coordinates };
	}

	return { kind: "search", query: trimmed };
}

/**
 * Picks the LocationSource once at startup. Command-line arguments win over the configured fixed location, and the
 * user is only prompted when neither is available.
 * @param args The command-line arguments, which are joined with spaces.
 * @param fixedLocation The configured fixed location, if any.
 * @param prompt Asks the user for a place name.
 */
export async function selectLocationSource(
	args: readonly string[],
	fixedLocation: GeoCoordinates | undefined,
	prompt: () => Promise< string >
): Promise< LocationSource > {
	const joined = args.join( " " );
	if ( joined ) {
		return locationSourceFromQuery( joined );
	}

	if ( fixedLocation ) {
		return { kind: "fixed", coordinates: fixedLocation };
	}

	return locationSourceFromQuery( await prompt() );
}

/**
 * Resolves a LocationSource to coordinates.
 * @param source The LocationSource selected at startup.
 * @param geocoder The Geocoder used for searches.
 * @return A Promise that will be resolved with the location, or rejected with a CodedError.
 */
export async function resolveLocation( source: LocationSource, geocoder: Geocoder ): Promise< ResolvedLocation > {
	switch ( source.kind ) {
		case "fixed":
			return { coordinates: source.coordinates };
		case "search":
			return geocoder.getLocation( source.query );
	}
}
