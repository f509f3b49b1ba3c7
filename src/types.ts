/** Geographic coordinates. The 1st element is the latitude, and the 2nd element is the longitude. */
export type GeoCoordinates = [number, number];

/** A location the forecast can be requested for. */
export interface ResolvedLocation {
	coordinates: GeoCoordinates;
	/** A short display name. Absent for fixed coordinates, which are reported under a generic title. */
	name?: string;
}

/** Weather conditions reported by the forecast feed. Unknown labels are rendered like "dry". */
export type WeatherCondition = "thunderstorm" | "rain" | "snow" | "sleet" | "hail" | "fog" | "cloudy" | "dry";

/** The condition that means nothing notable is happening. */
export const DRY_CONDITION: WeatherCondition = "dry";

/** A single hour of forecast data, parsed at the ingestion boundary. */
export interface HourlyObservation {
	/** The timestamp exactly as it was received. */
	timestamp: string;
	/** The calendar date of the observation (yyyy-MM-dd), taken from the timestamp as written. */
	day: string;
	/** The time of day of the observation (HH:mm), taken from the timestamp as written. */
	hour: string;
	/** The temperature (in Celsius). */
	temperature: number;
	/** The probability of precipitation (as a percentage), or null if the feed did not provide one. */
	precipitationProbability: number | null;
	condition: string;
}

export interface HourlyEntry {
	hour: string;
	temperature: number;
	precipitationProbability: number;
	condition: string;
}

/** The rollup of every observation that falls on a single day. */
export interface DaySummary {
	/** The calendar date (yyyy-MM-dd). */
	day: string;
	/** The highest temperature of the day (in Celsius). */
	high: number;
	/** The lowest temperature of the day (in Celsius). */
	low: number;
	/** The highest probability of precipitation of the day (as a percentage). */
	maxPrecipitationProbability: number;
	/** Every condition other than "dry" seen during the day, in the order it first appeared. */
	distinctConditions: string[];
	/** The hour by hour breakdown. Only filled in for the current day. */
	hourly: HourlyEntry[];
}

/** The time span a forecast is requested for. */
export interface ForecastRange {
	/** The first hour of the range (yyyy-MM-dd'T'HH:00, local to `timezone`). */
	from: string;
	/** The last hour of the range (yyyy-MM-dd'T'HH:00, local to `timezone`). */
	to: string;
	/** The IANA timezone the range and the returned timestamps are expressed in. */
	timezone: string;
}
