import { ForecastRange, GeoCoordinates, HourlyObservation } from "../types";
import { WeatherProvider } from "./WeatherProvider";

/**
 * A WeatherProvider for testing purposes that returns the observations provided in the constructor and remembers what
 * it was asked for.
 */
export default class MockWeatherProvider extends WeatherProvider {

	private readonly observations: HourlyObservation[];
	public readonly requests: { coordinates: GeoCoordinates, range: ForecastRange }[] = [];

	public constructor( observations: HourlyObservation[] ) {
		super();
		this.observations = observations;
	}

	protected async getHourlyForecastInternal( coordinates: GeoCoordinates, range: ForecastRange ): Promise< HourlyObservation[] > {
		this.requests.push( { coordinates, range } );
		return this.observations;
	}
}
