import { GeoCoordinates } from "./types";
import { CodedError, ErrorCode } from "./errors";
import { parseCoordinates } from "./locations";

/** How the timezone of the forecast (and of "today") is chosen. */
export type TimezoneSetting =
	| { mode: "local" }
	| { mode: "location" }
	| { mode: "zone", zone: string };

export interface Config {
	/** Coordinates to use when no location is given on the command line. */
	fixedLocation?: GeoCoordinates;
	/** How many days past the current hour the forecast covers. */
	forecastDays: number;
	forecastTimezone: TimezoneSetting;
	nominatimUrl: string;
	brightSkyUrl: string;
	userAgent: string;
}

const DEFAULT_FORECAST_DAYS = 3;
const DEFAULT_NOMINATIM_URL = "https://nominatim.openstreetmap.org";
const DEFAULT_BRIGHTSKY_URL = "https://api.brightsky.dev";
const DEFAULT_USER_AGENT = "forecast-cli";

/**
 * Returns a single value for an environment variable, treating empty and whitespace-only values as unset.
 */
function getVariable( env: NodeJS.ProcessEnv, name: string ): string | undefined {
	const value = env[ name ];
	if ( value && value.trim().length > 0 ) {
		return value.trim();
	}
	return undefined;
}

function parseForecastDays( raw: string | undefined ): number {
	if ( raw === undefined ) {
		return DEFAULT_FORECAST_DAYS;
	}

	const days = Number( raw );
	if ( !Number.isInteger( days ) || days < 1 ) {
		throw new CodedError( ErrorCode.InvalidConfiguration, `FORECAST_DAYS must be a positive integer (got "${ raw }")` );
	}
	return days;
}

function parseTimezone( raw: string | undefined ): TimezoneSetting {
	if ( raw === undefined || raw === "local" ) {
		return { mode: "local" };
	}
	if ( raw === "location" ) {
		return { mode: "location" };
	}

	try {
		new Intl.DateTimeFormat( "en-US", { timeZone: raw } );
	} catch ( err ) {
		throw new CodedError( ErrorCode.InvalidConfiguration, `FORECAST_TIMEZONE is not a known timezone (got "${ raw }")` );
	}
	return { mode: "zone", zone: raw };
}

function parseFixedLocation( raw: string | undefined ): GeoCoordinates | undefined {
	if ( raw === undefined ) {
		return undefined;
	}

	const coordinates = parseCoordinates( raw );
	if ( !coordinates ) {
		throw new CodedError( ErrorCode.InvalidLocationFormat, `FIXED_LOCATION must be "latitude,longitude" (got "${ raw }")` );
	}
	return coordinates;
}

function parseUrl( name: string, raw: string | undefined, fallback: string ): string {
	if ( raw === undefined ) {
		return fallback;
	}
	if ( !/^https?:\/\/[^\s/]+/.test( raw ) ) {
		throw new CodedError( ErrorCode.InvalidConfiguration, `${ name } must be an http(s) URL (got "${ raw }")` );
	}
	return raw.replace( /\/+$/, "" );
}

/**
 * Reads the program settings from the environment.
 * @param env The environment to read, which defaults to the process environment.
 * @throws CodedError if a setting is present but invalid.
 */
export function loadConfig( env: NodeJS.ProcessEnv = process.env ): Config {
	return {
		fixedLocation: parseFixedLocation( getVariable( env, "FIXED_LOCATION" ) ),
		forecastDays: parseForecastDays( getVariable( env, "FORECAST_DAYS" ) ),
		forecastTimezone: parseTimezone( getVariable( env, "FORECAST_TIMEZONE" ) ),
		nominatimUrl: parseUrl( "NOMINATIM_URL", getVariable( env, "NOMINATIM_URL" ), DEFAULT_NOMINATIM_URL ),
		brightSkyUrl: parseUrl( "BRIGHTSKY_URL", getVariable( env, "BRIGHTSKY_URL" ), DEFAULT_BRIGHTSKY_URL ),
		userAgent: getVariable( env, "USER_AGENT" ) || DEFAULT_USER_AGENT
	};
}
