import { expect } from "chai";
import { loadConfig } from "./config";
import { CodedError, ErrorCode } from "./errors";

function configError( env: NodeJS.ProcessEnv ): CodedError {
	try {
		loadConfig( env );
	} catch ( err ) {
		if ( err instanceof CodedError ) {
			return err;
		}
		throw err;
	}
	throw new Error( "expected loadConfig to throw" );
}

describe( "loadConfig", () => {
	it( "uses defaults for an empty environment", () => {
		expect( loadConfig( {} ) ).to.eql( {
			fixedLocation: undefined,
			forecastDays: 3,
			forecastTimezone: { mode: "local" },
			nominatimUrl: "https://nominatim.openstreetmap.org",
			brightSkyUrl: "https://api.brightsky.dev",
			userAgent: "forecast-cli"
		} );
	} );

	it( "treats blank values as unset", () => {
		const config = loadConfig( { FORECAST_DAYS: "  ", FIXED_LOCATION: "", USER_AGENT: " " } );
		expect( config.forecastDays ).to.equal( 3 );
		expect( config.fixedLocation ).to.equal( undefined );
		expect( config.userAgent ).to.equal( "forecast-cli" );
	} );

	it( "reads every setting", () => {
		const config = loadConfig( {
			FIXED_LOCATION: "52.52, 13.405",
			FORECAST_DAYS: "5",
			FORECAST_TIMEZONE: "Europe/Berlin",
			NOMINATIM_URL: "http://localhost:8080/",
			BRIGHTSKY_URL: "https://weather.example.org/api",
			USER_AGENT: "my-forecast/2.0"
		} );

		expect( config ).to.eql( {
			fixedLocation: [ 52.52, 13.405 ],
			forecastDays: 5,
			forecastTimezone: { mode: "zone", zone: "Europe/Berlin" },
			nominatimUrl: "http://localhost:8080",
			brightSkyUrl: "https://weather.example.org/api",
			userAgent: "my-forecast/2.0"
		} );
	} );

	it( "accepts the location timezone mode", () => {
		expect( loadConfig( { FORECAST_TIMEZONE: "location" } ).forecastTimezone ).to.eql( { mode: "location" } );
	} );

	it( "rejects invalid forecast lengths", () => {
		for ( const days of [ "0", "-1", "2.5", "three" ] ) {
			expect( configError( { FORECAST_DAYS: days } ).errCode ).to.equal( ErrorCode.InvalidConfiguration );
		}
	} );

	it( "rejects unknown timezones", () => {
		const error = configError( { FORECAST_TIMEZONE: "Mars/Olympus_Mons" } );
		expect( error.errCode ).to.equal( ErrorCode.InvalidConfiguration );
		expect( error.message ).to.equal( "FORECAST_TIMEZONE is not a known timezone (got \"Mars/Olympus_Mons\")" );
	} );

	it( "rejects a malformed fixed location", () => {
		expect( configError( { FIXED_LOCATION: "somewhere" } ).errCode ).to.equal( ErrorCode.InvalidLocationFormat );
	} );

	it( "rejects URLs that are not http(s)", () => {
		expect( configError( { BRIGHTSKY_URL: "ftp://weather.example.org" } ).errCode ).to.equal( ErrorCode.InvalidConfiguration );
	} );
} );
