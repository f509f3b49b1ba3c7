#!/usr/bin/env node
import "dotenv/config";

import * as readline from "readline";

import { Config, loadConfig } from "./config";
import { CodedError, ErrorCode, makeCodedError } from "./errors";
import { logger } from "./logger";
import { selectLocationSource } from "./locations";
import { ForecastServices, getForecastReport } from "./weather";
import Nominatim from "./geocoders/Nominatim";
import BrightSkyWeatherProvider from "./weatherProviders/BrightSky";

/** Anything the CLI can write text to. */
export interface TextOutput {
	write( text: string ): unknown;
}

/** Everything `main` reads from or writes to outside of its arguments. */
export interface CliContext {
	env: NodeJS.ProcessEnv;
	stdout: TextOutput;
	stderr: TextOutput;
	/** Asks the user for a place name. */
	prompt: () => Promise< string >;
	/** Builds the location and forecast services from the settings. */
	createServices: ( config: Config ) => ForecastServices;
	now?: Date;
}

/**
 * Asks for a city on `output` and reads one line from `input`. Resolves with an empty string if the input ends first.
 */
export function promptForCity( input: NodeJS.ReadableStream, output: TextOutput ): Promise< string > {
	return new Promise( ( resolve ) => {
		output.write( "City: " );

		const rl = readline.createInterface( { input, terminal: false } );
		let answer = "";
		rl.once( "line", ( line ) => {
			answer = line;
			rl.close();
		} );
		rl.once( "close", () => resolve( answer ) );
	} );
}

export function createServices( config: Config ): ForecastServices {
	return {
		geocoder: new Nominatim( config.nominatimUrl, config.userAgent ),
		weatherProvider: new BrightSkyWeatherProvider( config.brightSkyUrl, config.userAgent )
	};
}

/**
 * Returns the one-line diagnostic for a failed run.
 * @param error The error that ended the run.
 * @param query The place name that was searched for, if any.
 */
export function describeError( error: CodedError, query: string | undefined ): string {
	switch ( error.errCode ) {
		case ErrorCode.NoLocationFound:
			return `Could not find city: ${ query ?? error.message }`;
		case ErrorCode.LocationServiceApiError:
			return "Location service unavailable";
		case ErrorCode.InvalidLocationFormat:
			return `Invalid location: ${ error.message }`;
		case ErrorCode.InvalidConfiguration:
			return `Invalid configuration: ${ error.message }`;
		default:
			return `Error: ${ error.message || ErrorCode[ error.errCode ] }`;
	}
}

/**
 * Runs the program once: the report goes to `stdout`, a single diagnostic line to `stderr` if anything fails.
 * @param args The command-line arguments.
 * @param context The environment and streams to use.
 * @return A Promise resolved with the exit code, 0 on success and otherwise the ErrorCode of the failure.
 */
export async function main( args: string[], context: CliContext ): Promise< number > {
	let query: string | undefined;
	try {
		const config = loadConfig( context.env );
		const source = await selectLocationSource( args, config.fixedLocation, context.prompt );
		if ( source.kind === "search" ) {
			query = source.query;
		}

		const report = await getForecastReport( source, context.createServices( config ), config, context.now );

		context.stdout.write( report.join( "\n" ) + "\n" );
		return ErrorCode.NoError;
	} catch ( err ) {
		const error = makeCodedError( err );
		if ( error.errCode === ErrorCode.UnexpectedError ) {
			logger.error( { err }, "An unexpected error occurred" );
		}

		context.stderr.write( describeError( error, query ) + "\n" );
		return error.errCode;
	}
}

if ( require.main === module ) {
	main( process.argv.slice( 2 ), {
		env: process.env,
		stdout: process.stdout,
		stderr: process.stderr,
		prompt: () => promptForCity( process.stdin, process.stderr ),
		createServices
	} ).then( ( code ) => {
		process.exitCode = code;
	} );
}
