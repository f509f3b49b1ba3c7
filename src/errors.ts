export enum ErrorCode {
	/** No error occurred. */
	NoError = 0,

	/** The forecast could not be produced due to a problem with the weather information. */
	BadWeatherData = 1,
	/** A necessary field was missing from weather data returned by the API. */
	MissingWeatherField = 11,
	/** An HTTP or parsing error occurred when retrieving weather information. */
	WeatherApiError = 12,

	/** The specified location could not be resolved. */
	LocationError = 2,
	/** An HTTP or parsing error occurred when resolving the location. */
	LocationServiceApiError = 20,
	/** No matches were found for the specified location name. */
	NoLocationFound = 21,
	/** The location was empty or specified in an invalid format (e.g. a malformed coordinate pair). */
	InvalidLocationFormat = 22,

	/** An error related to the program settings. */
	ConfigurationError = 5,
	/** A setting could not be parsed. */
	InvalidConfiguration = 50,

	/** An error was not properly handled and assigned a more specific error code. */
	UnexpectedError = 99
}

/** An error with a numeric code that can be used to identify the type of error. */
export class CodedError extends Error {
	public readonly errCode: ErrorCode;

	public constructor( errCode: ErrorCode, message?: string ) {
		super( message );
		// https://github.com/Microsoft/TypeScript-wiki/blob/master/Breaking-Changes.md#extending-built-ins-like-error-array-and-map-may-no-longer-work
		Object.setPrototypeOf( this, CodedError.prototype );
		this.name = "CodedError";
		this.errCode = errCode;
	}
}

/**
 * Returns a CodedError representing the specified error. If `err` is a CodedError, the same object will be returned.
 * Otherwise it is assumed that the error wasn't properly handled, so a CodedError with an "UnexpectedError" code and
 * the original message will be returned.
 * @param err Any error caught in a try-catch statement.
 * @return A CodedError representing the error that was passed to the function.
 */
export function makeCodedError( err: unknown ): CodedError {
	if ( err instanceof CodedError ) {
		return err;
	} else {
		return new CodedError( ErrorCode.UnexpectedError, err instanceof Error ? err.message : String( err ) );
	}
}
