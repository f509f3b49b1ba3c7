import { ResolvedLocation } from "../types";
import { CodedError, ErrorCode } from "../errors";
import { logger } from "../logger";

export abstract class Geocoder {

	protected readonly log = logger.child( { component: this.constructor.name } );

	/**
	 * Converts a location name to geographic coordinates and a short display name.
	 * @param location A location name.
	 * @return A Promise that will be resolved with the best match for the specified location, or rejected with a
	 * CodedError.
	 */
	protected abstract geocodeLocation( location: string ): Promise< ResolvedLocation >;

	/**
	 * Converts a location name to geographic coordinates. Every call goes to the location service; nothing is cached.
	 */
	public async getLocation( location: string ): Promise< ResolvedLocation > {
		const query = location.trim();
		if ( !query ) {
			throw new CodedError( ErrorCode.InvalidLocationFormat, "no location was given" );
		}

		const resolved = await this.geocodeLocation( query );
		this.log.info( { query, coordinates: resolved.coordinates, name: resolved.name }, "Resolved location" );
		return resolved;
	}
}
