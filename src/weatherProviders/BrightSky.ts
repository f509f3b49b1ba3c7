import { DRY_CONDITION, ForecastRange, GeoCoordinates, HourlyObservation } from "../types";
import { CodedError, ErrorCode } from "../errors";
import { httpJSONRequest, isRecord } from "../http";
import { WeatherProvider } from "./WeatherProvider";

/** Matches the local date and the hour:minute at the start of an ISO-8601 timestamp. */
const TIMESTAMP = /^(\d{4}-\d{2}-\d{2})T(\d{2}:\d{2})/;

/**
 * Converts one record of the Bright Sky `weather` array into an HourlyObservation. The day and hour are taken from the
 * timestamp as written, so they stay in the timezone that was requested.
 * @param record A single entry of the response.
 * @return The decoded observation.
 * @throws CodedError MissingWeatherField if the timestamp or temperature is missing or malformed.
 */
export function decodeObservation( record: unknown ): HourlyObservation {
	if ( !isRecord( record ) ) {
		throw new CodedError( ErrorCode.MissingWeatherField, "weather record is not an object" );
	}

	const timestamp = record.timestamp;
	const match = typeof timestamp === "string" ? TIMESTAMP.exec( timestamp ) : null;
	if ( typeof timestamp !== "string" || !match ) {
		throw new CodedError( ErrorCode.MissingWeatherField, `invalid timestamp: ${ JSON.stringify( timestamp ) }` );
	}

	const temperature = record.temperature;
	if ( typeof temperature !== "number" || isNaN( temperature ) ) {
		throw new CodedError( ErrorCode.MissingWeatherField, `missing temperature at ${ timestamp }` );
	}

	const precipitationProbability = record.precipitation_probability;
	const condition = record.condition;

	return {
		timestamp,
		day: match[ 1 ],
		hour: match[ 2 ],
		temperature,
		precipitationProbability: typeof precipitationProbability === "number" ? precipitationProbability : null,
		// Bright Sky reports no condition when it cannot tell; that is shown like dry weather.
		condition: typeof condition === "string" ? condition : DRY_CONDITION
	};
}

/**
 * Hourly forecasts from Bright Sky (https://brightsky.dev), which serves DWD data for free and without an API key.
 */
export default class BrightSkyWeatherProvider extends WeatherProvider {
	private readonly baseUrl: string;
	private readonly userAgent: string;

	public constructor( baseUrl: string, userAgent: string ) {
		super();
		this.baseUrl = baseUrl;
		this.userAgent = userAgent;
	}

	protected async getHourlyForecastInternal( coordinates: GeoCoordinates, range: ForecastRange ): Promise< HourlyObservation[] > {
		const url = `${ this.baseUrl }/weather?lat=${ coordinates[ 0 ] }&lon=${ coordinates[ 1 ] }` +
			`&date=${ encodeURIComponent( range.from ) }&last_date=${ encodeURIComponent( range.to ) }` +
			`&tz=${ encodeURIComponent( range.timezone ) }`;
		this.log.debug( { url }, "Requesting forecast" );

		let data: unknown;
		try {
			data = await httpJSONRequest( url, { "User-Agent": this.userAgent } );
		} catch ( err ) {
			this.log.error( { err }, "Error retrieving weather information from Bright Sky" );
			throw new CodedError( ErrorCode.WeatherApiError, err instanceof Error ? err.message : String( err ) );
		}

		if ( !isRecord( data ) || !Array.isArray( data.weather ) ) {
			throw new CodedError( ErrorCode.MissingWeatherField, "response has no weather records" );
		}

		return data.weather.map( decodeObservation );
	}
}
