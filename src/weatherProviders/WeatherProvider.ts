import { ForecastRange, GeoCoordinates, HourlyObservation } from "../types";
import { logger } from "../logger";

export abstract class WeatherProvider {

	protected readonly log = logger.child( { component: this.constructor.name } );

	/**
	 * Retrieves the hourly forecast for a location.
	 * @param coordinates The coordinates to retrieve the forecast for.
	 * @param range The hours to retrieve, and the timezone the returned timestamps should be expressed in.
	 * @return A Promise that will be resolved with the observations in chronological order, or rejected with a
	 * CodedError if the forecast could not be retrieved or decoded.
	 */
	public async getHourlyForecast( coordinates: GeoCoordinates, range: ForecastRange ): Promise< HourlyObservation[] > {
		const observations = await this.getHourlyForecastInternal( coordinates, range );
		this.log.info( { coordinates, range, count: observations.length }, "Retrieved hourly forecast" );
		return observations;
	}

	/**
	 * Internal command to get the forecast from an API.
	 * @param coordinates Coordinates of requested data
	 * @param range Requested hours and timezone
	 * @returns Returns the observations in chronological order (array should not be mutated)
	 */
	protected abstract getHourlyForecastInternal( coordinates: GeoCoordinates, range: ForecastRange ): Promise< HourlyObservation[] >;
}
