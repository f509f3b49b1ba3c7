import { ResolvedLocation } from "../types";
import { CodedError, ErrorCode } from "../errors";
import { httpJSONRequest, isRecord } from "../http";
import { Geocoder } from "./Geocoder";

/**
 * Looks up place names with the OpenStreetMap Nominatim search API. Nominatim rejects requests without a User-Agent.
 */
export default class Nominatim extends Geocoder {
	private readonly baseUrl: string;
	private readonly userAgent: string;

	public constructor( baseUrl: string, userAgent: string ) {
		super();
		this.baseUrl = baseUrl;
		this.userAgent = userAgent;
	}

	protected async geocodeLocation( location: string ): Promise< ResolvedLocation > {
		const url = `${ this.baseUrl }/search?q=${ encodeURIComponent( location ) }&format=json&limit=1`;
		this.log.debug( { url }, "Requesting location" );

		let data: unknown;
		try {
			data = await httpJSONRequest( url, { "User-Agent": this.userAgent } );
		} catch ( err ) {
			this.log.error( { err }, "Error resolving location with Nominatim" );
			throw new CodedError( ErrorCode.LocationServiceApiError );
		}

		if ( !Array.isArray( data ) ) {
			throw new CodedError( ErrorCode.LocationServiceApiError );
		}

		if ( !data.length ) {
			throw new CodedError( ErrorCode.NoLocationFound, location );
		}

		const first: unknown = data[ 0 ];
		if ( !isRecord( first ) || typeof first.lat !== "string" || typeof first.lon !== "string" || typeof first.display_name !== "string" ) {
			throw new CodedError( ErrorCode.LocationServiceApiError );
		}

		const latitude = parseFloat( first.lat );
		const longitude = parseFloat( first.lon );
		if ( isNaN( latitude ) || isNaN( longitude ) ) {
			throw new CodedError( ErrorCode.LocationServiceApiError );
		}

		// Only the first part of the address is shown, e.g. "Berlin" out of "Berlin, Deutschland".
		const name = first.display_name.split( "," )[ 0 ].trim();

		return { coordinates: [ latitude, longitude ], name };
	}
}
