import * as geoTZ from "geo-tz";
import { TZDate } from "@date-fns/tz";
import { addHours, format, startOfHour } from "date-fns";

import { ForecastRange, GeoCoordinates } from "./types";
import { TimezoneSetting } from "./config";
import { LocationSource, resolveLocation } from "./locations";
import { Geocoder } from "./geocoders/Geocoder";
import { WeatherProvider } from "./weatherProviders/WeatherProvider";
import { aggregate } from "./report/aggregate";
import { render } from "./report/render";

const HOUR_FORMAT = "yyyy-MM-dd'T'HH:00";

export interface ForecastWindow {
	/** The current date (yyyy-MM-dd) in the forecast timezone. */
	today: string;
	range: ForecastRange;
}

export interface ForecastServices {
	geocoder: Geocoder;
	weatherProvider: WeatherProvider;
}

export interface ForecastOptions {
	forecastDays: number;
	forecastTimezone: TimezoneSetting;
}

/**
 * Returns the timezone the host is running in.
 */
export function localTimezone(): string {
	return Intl.DateTimeFormat().resolvedOptions().timeZone;
}

/**
 * Picks the timezone a forecast is presented in.
 * @param setting The configured timezone setting.
 * @param coordinates The location of the forecast, used when the setting asks for the location's own timezone.
 */
export function getTZ( setting: TimezoneSetting, coordinates: GeoCoordinates ): string {
	switch ( setting.mode ) {
		case "local":
			return localTimezone();
		case "location":
			return geoTZ.find( coordinates[ 0 ], coordinates[ 1 ] )[ 0 ] ?? localTimezone();
		case "zone":
			return setting.zone;
	}
}

/**
 * Computes the current date and the forecast range: from the current hour up to exactly `days` × 24 hours later, so
 * the last hour shifts by one across a daylight saving change.
 * @param now The current time.
 * @param days The length of the range in days.
 * @param timezone The timezone the date and the range are expressed in.
 */
export function forecastWindow( now: Date, days: number, timezone: string ): ForecastWindow {
	const from = startOfHour( TZDate.tz( timezone, now ) );
	const to = addHours( from, 24 * days );

	return {
		today: format( from, "yyyy-MM-dd" ),
		range: {
			from: format( from, HOUR_FORMAT ),
			to: format( to, HOUR_FORMAT ),
			timezone
		}
	};
}

/**
 * Resolves the location, retrieves its hourly forecast and renders the report. Nothing is rendered unless both
 * lookups succeed.
 * @param source Where the location comes from.
 * @param services The location and forecast services.
 * @param options The forecast length and timezone.
 * @param now The current time.
 * @return A Promise that will be resolved with the report lines, or rejected with a CodedError.
 */
export async function getForecastReport(
	source: LocationSource,
	services: ForecastServices,
	options: ForecastOptions,
	now: Date = new Date()
): Promise< string[] > {
	const location = await resolveLocation( source, services.geocoder );
	const timezone = getTZ( options.forecastTimezone, location.coordinates );
	const { today, range } = forecastWindow( now, options.forecastDays, timezone );

	const observations = await services.weatherProvider.getHourlyForecast( location.coordinates, range );
	return render( aggregate( observations, today ), today, location.name );
}
