import { expect } from "chai";
import { CodedError, ErrorCode } from "../errors";
import { Geocoder } from "../geocoders/Geocoder";
import { HourlyObservation, ResolvedLocation } from "../types";

/**
 * Waits for a promise and checks that it was rejected with a CodedError carrying the given code.
 */
export async function expectCodedError( promise: Promise< unknown >, errCode: ErrorCode ): Promise< CodedError > {
	let error: unknown;
	try {
		await promise;
	} catch ( err ) {
		error = err;
	}

	expect( error ).to.be.instanceOf( CodedError );
	if ( !( error instanceof CodedError ) ) {
		throw new Error( "unreachable" );
	}
	expect( ErrorCode[ error.errCode ] ).to.equal( ErrorCode[ errCode ] );
	return error;
}

/**
 * Builds an observation from a timestamp written the way the forecast feed writes it.
 */
export function observation(
	timestamp: string,
	temperature: number,
	precipitationProbability: number | null,
	condition: string
): HourlyObservation {
	return {
		timestamp,
		day: timestamp.slice( 0, 10 ),
		hour: timestamp.slice( 11, 16 ),
		temperature,
		precipitationProbability,
		condition
	};
}

/**
 * A Geocoder that answers from a fixed table and records the queries it receives.
 */
export class StubGeocoder extends Geocoder {
	public readonly queries: string[] = [];
	private readonly results: Map< string, ResolvedLocation >;

	public constructor( results: Record< string, ResolvedLocation > ) {
		super();
		this.results = new Map( Object.entries( results ) );
	}

	protected async geocodeLocation( location: string ): Promise< ResolvedLocation > {
		this.queries.push( location );
		const result = this.results.get( location );
		if ( !result ) {
			throw new CodedError( ErrorCode.NoLocationFound, location );
		}
		return result;
	}
}
