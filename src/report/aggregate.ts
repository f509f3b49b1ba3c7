import { DaySummary, DRY_CONDITION, HourlyObservation } from "../types";

/**
 * Rolls hourly observations up into one summary per day.
 *
 * Days are returned in the order they first appear in the input, and the hourly breakdown of the current day keeps the
 * input order as well; the observations are expected to already be sorted by time. Missing precipitation
 * probabilities count as 0. No rounding takes place here.
 * @param observations The hourly observations.
 * @param today The current date (yyyy-MM-dd). Only this day gets an hourly breakdown.
 * @return The day summaries.
 */
export function aggregate( observations: readonly HourlyObservation[], today: string ): DaySummary[] {
	const days = new Map< string, DaySummary >();

	for ( const observation of observations ) {
		let summary = days.get( observation.day );
		if ( !summary ) {
			summary = {
				day: observation.day,
				high: -Infinity,
				low: Infinity,
				maxPrecipitationProbability: 0,
				distinctConditions: [],
				hourly: []
			};
			days.set( observation.day, summary );
		}

		const temperature = observation.temperature;
		const precipitationProbability = observation.precipitationProbability ?? 0;

		summary.high = Math.max( summary.high, temperature );
		summary.low = Math.min( summary.low, temperature );
		summary.maxPrecipitationProbability = Math.max( summary.maxPrecipitationProbability, precipitationProbability );

		if ( observation.condition !== DRY_CONDITION && !summary.distinctConditions.includes( observation.condition ) ) {
			summary.distinctConditions.push( observation.condition );
		}

		if ( observation.day === today ) {
			summary.hourly.push( {
				hour: observation.hour,
				temperature,
				precipitationProbability,
				condition: observation.condition
			} );
		}
	}

	return Array.from( days.values() );
}
