/** ANSI escape sequences used by the report. */
export const Style = {
	bold: "\x1b[1m",
	dim: "\x1b[2m",
	cyan: "\x1b[36m",
	blue: "\x1b[34m",
	green: "\x1b[32m",
	yellow: "\x1b[33m",
	red: "\x1b[31m",
	reset: "\x1b[0m"
} as const;

/**
 * Picks the color for a temperature (in Celsius). Each bucket includes its lower bound.
 */
export function temperatureColor( temperature: number ): string {
	if ( temperature < 0 ) {
		return Style.blue;
	} else if ( temperature < 10 ) {
		return Style.cyan;
	} else if ( temperature < 20 ) {
		return Style.green;
	} else if ( temperature < 30 ) {
		return Style.yellow;
	}
	return Style.red;
}

/**
 * Picks the color for a probability of precipitation (as a percentage).
 */
export function precipitationColor( probability: number ): string {
	if ( probability >= 70 ) {
		return Style.red;
	} else if ( probability >= 40 ) {
		return Style.yellow;
	}
	return Style.dim;
}

const ICONS: Record< string, string > = {
	thunderstorm: "⛈️",
	rain: "🌧️",
	snow: "❄️",
	sleet: "🌨️",
	hail: "🧊",
	fog: "🌫️",
	cloudy: "☁️"
};

export const CLEAR_ICON = "☀️";

/** Conditions in the order they take over a day's icon. */
export const ICON_PRIORITY: readonly string[] = [ "thunderstorm", "rain", "snow", "sleet", "hail", "fog", "cloudy" ];

/**
 * Returns the icon for a single condition. Unknown conditions, including "dry", get the clear sky icon.
 */
export function conditionIcon( condition: string ): string {
	return Object.prototype.hasOwnProperty.call( ICONS, condition ) ? ICONS[ condition ] : CLEAR_ICON;
}

/**
 * Returns the icon for a whole day: the first condition of ICON_PRIORITY that occurred, no matter how often or when.
 * @param conditions The distinct conditions of the day.
 */
export function dayIcon( conditions: readonly string[] ): string {
	const condition = ICON_PRIORITY.find( ( candidate ) => conditions.includes( candidate ) );
	return condition ? conditionIcon( condition ) : CLEAR_ICON;
}

/**
 * Formats a number with a fixed number of decimals, rounding half to even.
 *
 * `toFixed` already rounds to the nearest output using the exact binary value, and a value can only lie exactly
 * halfway between two outputs when multiplying it by 2^(digits + 1) gives an odd integer. Only those ties are
 * rounded differently, towards the even last digit. A negative value keeps its sign even when it rounds to zero
 * ("-0", "-0.0").
 * @param value The number to format.
 * @param digits The number of decimals.
 */
export function formatFixed( value: number, digits: number ): string {
	let text: string;
	const halves = value * 2 ** ( digits + 1 );
	if ( Number.isInteger( halves ) && Math.abs( halves ) % 2 === 1 ) {
		const scaled = value * 10 ** digits;
		const lower = Math.floor( scaled );
		const even = lower % 2 === 0 ? lower : lower + 1;
		text = ( even / 10 ** digits ).toFixed( digits );
	} else {
		text = value.toFixed( digits );
	}

	if ( ( value < 0 || Object.is( value, -0 ) ) && !text.startsWith( "-" ) ) {
		text = "-" + text;
	}
	return text;
}

/**
 * Formats a number like `formatFixed` and right-aligns it.
 */
export function formatColumn( value: number, width: number, digits: number ): string {
	return formatFixed( value, digits ).padStart( width );
}
