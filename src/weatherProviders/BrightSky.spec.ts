import { expect } from "chai";
import nock from "nock";
import BrightSkyWeatherProvider, { decodeObservation } from "./BrightSky";
import { CodedError, ErrorCode } from "../errors";
import { ForecastRange, GeoCoordinates } from "../types";
import { expectCodedError } from "../test/helpers";

const BASE_URL = "https://brightsky.test";
const COORDINATES: GeoCoordinates = [ 52.52, 13.405 ];
const RANGE: ForecastRange = { from: "2026-10-18T14:00", to: "2026-10-21T14:00", timezone: "Europe/Berlin" };

function mockWeather() {
	return nock( BASE_URL )
		.matchHeader( "User-Agent", "forecast-cli-test" )
		.get( "/weather" )
		.query( {
			lat: "52.52",
			lon: "13.405",
			date: "2026-10-18T14:00",
			last_date: "2026-10-21T14:00",
			tz: "Europe/Berlin"
		} );
}

describe( "Bright Sky WeatherProvider", () => {
	const provider = new BrightSkyWeatherProvider( BASE_URL, "forecast-cli-test" );

	before( () => nock.disableNetConnect() );
	afterEach( () => nock.cleanAll() );
	after( () => nock.enableNetConnect() );

	it( "decodes the hourly records in order", async () => {
		mockWeather().reply( 200, {
			weather: [
				{ timestamp: "2026-10-18T14:00:00+02:00", temperature: 12.3, precipitation_probability: 20, condition: "dry", icon: "partly-cloudy-day" },
				{ timestamp: "2026-10-18T15:00:00+02:00", temperature: 11.9, precipitation_probability: null, condition: null },
				{ timestamp: "2026-10-19T00:00:00+02:00", temperature: 6, condition: "rain" }
			],
			sources: []
		} );

		const observations = await provider.getHourlyForecast( COORDINATES, RANGE );

		expect( observations ).to.eql( [
			{ timestamp: "2026-10-18T14:00:00+02:00", day: "2026-10-18", hour: "14:00", temperature: 12.3, precipitationProbability: 20, condition: "dry" },
			{ timestamp: "2026-10-18T15:00:00+02:00", day: "2026-10-18", hour: "15:00", temperature: 11.9, precipitationProbability: null, condition: "dry" },
			{ timestamp: "2026-10-19T00:00:00+02:00", day: "2026-10-19", hour: "00:00", temperature: 6, precipitationProbability: null, condition: "rain" }
		] );
	} );

	it( "reports HTTP errors as a weather API error", async () => {
		mockWeather().reply( 500, { title: "Internal Server Error" } );

		await expectCodedError( provider.getHourlyForecast( COORDINATES, RANGE ), ErrorCode.WeatherApiError );
	} );

	it( "reports a body that is not JSON as a weather API error", async () => {
		mockWeather().reply( 200, "Bad Gateway" );

		await expectCodedError( provider.getHourlyForecast( COORDINATES, RANGE ), ErrorCode.WeatherApiError );
	} );

	it( "reports a response without weather records as a missing field", async () => {
		mockWeather().reply( 200, { sources: [] } );

		await expectCodedError( provider.getHourlyForecast( COORDINATES, RANGE ), ErrorCode.MissingWeatherField );
	} );

	it( "fails the whole forecast when one record cannot be decoded", async () => {
		mockWeather().reply( 200, {
			weather: [
				{ timestamp: "2026-10-18T14:00:00+02:00", temperature: 12.3, precipitation_probability: 20, condition: "dry" },
				{ timestamp: "2026-10-18T15:00:00+02:00", temperature: null, precipitation_probability: 20, condition: "dry" }
			]
		} );

		const error = await expectCodedError( provider.getHourlyForecast( COORDINATES, RANGE ), ErrorCode.MissingWeatherField );
		expect( error.message ).to.equal( "missing temperature at 2026-10-18T15:00:00+02:00" );
	} );
} );

describe( "decodeObservation", () => {
	it( "takes the day and hour from the timestamp as written", () => {
		const decoded = decodeObservation( { timestamp: "2026-10-18T23:00:00-04:00", temperature: -3.5, precipitation_probability: 0, condition: "snow" } );

		expect( decoded.day ).to.equal( "2026-10-18" );
		expect( decoded.hour ).to.equal( "23:00" );
	} );

	it( "rejects timestamps that are too short", () => {
		expect( () => decodeObservation( { timestamp: "2026-10-18", temperature: 1 } ) ).to.throw( CodedError, "invalid timestamp: \"2026-10-18\"" );
		expect( () => decodeObservation( { temperature: 1 } ) ).to.throw( CodedError, "invalid timestamp: undefined" );
	} );

	it( "rejects records that are not objects", () => {
		expect( () => decodeObservation( "2026-10-18T14:00" ) ).to.throw( CodedError, "weather record is not an object" );
	} );
} );
