import * as http from "http";
import * as https from "https";

/** Headers sent with every outbound request. */
export type RequestHeaders = Record< string, string >;

/**
 * Makes an HTTP/HTTPS GET request to the specified URL and returns the response body.
 * @param url The URL to fetch.
 * @param headers Extra request headers.
 * @return A Promise that will be resolved with the response body if the request succeeds, or will be rejected with an
 * error if the request fails or returns a non-200 status code.
 */
export function httpRequest( url: string, headers: RequestHeaders = {} ): Promise< string > {
	return new Promise< string >( ( resolve, reject ) => {
		const target = new URL( url );

		const onResponse = ( response: http.IncomingMessage ): void => {
			if ( response.statusCode !== 200 ) {
				// Drain the body so the socket is released.
				response.resume();
				reject( new Error( `Received ${ response.statusCode } status code for URL '${ url }'.` ) );
				return;
			}

			let data = "";
			response.setEncoding( "utf8" );

			// Reassemble the data as it comes in
			response.on( "data", ( chunk: string ) => {
				data += chunk;
			} );

			// Once the data is completely received, resolve the promise
			response.on( "end", () => {
				resolve( data );
			} );

			response.on( "error", reject );
		};

		const request = target.protocol === "https:" ?
			https.get( target, { headers }, onResponse ) :
			http.get( target, { headers }, onResponse );

		request.on( "error", ( err ) => {

			// If the HTTP request fails, reject the promise
			reject( err );
		} );
	} );
}

/**
 * Makes an HTTP/HTTPS GET request to the specified URL and parses the JSON response body.
 * @param url The URL to fetch.
 * @param headers Extra request headers.
 * @return A Promise that will be resolved with the parsed response body if the request succeeds, or will be rejected
 * with an error if the request or JSON parsing fails.
 */
export async function httpJSONRequest( url: string, headers: RequestHeaders = {} ): Promise< unknown > {
	const data: string = await httpRequest( url, headers );
	return JSON.parse( data );
}

/**
 * Narrows an unknown value to a plain object so its fields can be inspected.
 */
export function isRecord( value: unknown ): value is Record< string, unknown > {
	return typeof value === "object" && value !== null && !Array.isArray( value );
}
