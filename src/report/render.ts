import { format, parseISO } from "date-fns";

import { DaySummary, HourlyEntry } from "../types";
import { conditionIcon, dayIcon, formatColumn, precipitationColor, Style, temperatureColor } from "./styles";

/** The report title used when the location has no name (fixed coordinates). */
export const OVERVIEW_TITLE = "Overview";

const RULE = "─".repeat( 38 );
const LABEL_WIDTH = 10;

function temperatureCell( temperature: number ): string {
	return `${ temperatureColor( temperature ) }${ formatColumn( temperature, 5, 1 ) }°${ Style.reset }`;
}

function precipitationCell( probability: number ): string {
	return `${ precipitationColor( probability ) }${ formatColumn( probability, 3, 0 ) }%${ Style.reset }`;
}

/**
 * Returns the label of a day card: a bold "Today", or the weekday and date (e.g. "Mon 19.10.").
 */
export function dayLabel( day: string, today: string ): string {
	if ( day === today ) {
		return `${ Style.bold }Today${ Style.reset }     `;
	}
	return format( parseISO( day ), "EEE dd.MM." ).padEnd( LABEL_WIDTH );
}

function renderCard( summary: DaySummary, today: string ): string {
	return `  ${ dayLabel( summary.day, today ) } ${ dayIcon( summary.distinctConditions ) }  ` +
		`${ temperatureCell( summary.low ) }  …  ${ temperatureCell( summary.high ) }  ` +
		precipitationCell( summary.maxPrecipitationProbability );
}

function renderHour( entry: HourlyEntry ): string {
	return `  ${ entry.hour }  ${ conditionIcon( entry.condition ) }  ${ temperatureCell( entry.temperature ) }  ` +
		precipitationCell( entry.precipitationProbability );
}

/**
 * Renders the forecast report: a card per day followed by the hourly breakdown of the current day, if there is one.
 * @param days The day summaries, in display order.
 * @param today The current date (yyyy-MM-dd).
 * @param title The location name shown above the cards.
 * @return The lines of the report, to be joined with newlines.
 */
export function render( days: readonly DaySummary[], today: string, title: string = OVERVIEW_TITLE ): string[] {
	const lines: string[] = [
		"",
		`  ${ Style.bold }${ Style.cyan }${ title }${ Style.reset }`,
		`  ${ Style.dim }                 Temp             Rain${ Style.reset }`,
		`  ${ Style.dim }${ RULE }${ Style.reset }`
	];

	for ( const summary of days ) {
		lines.push( renderCard( summary, today ) );
	}

	const current = days.find( ( summary ) => summary.day === today );
	if ( current && current.hourly.length ) {
		lines.push(
			"",
			`  ${ Style.dim }Time         Temp   Rain${ Style.reset }`,
			`  ${ Style.dim }${ RULE }${ Style.reset }`
		);
		for ( const entry of current.hourly ) {
			lines.push( renderHour( entry ) );
		}
	}

	lines.push( "" );
	return lines;
}
