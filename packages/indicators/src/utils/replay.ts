import type { IndicatorState } from "../types";

/**
 * Feed an ordered slice into a state, supplying the departing value the
 * same way the live path does.
 */
export const replayInto = (
	state: Pick<IndicatorState, "update" | "window">,
	history: readonly number[]
): number => {
	let value = Number.NaN;
	for (let i = 0; i < history.length; i += 1) {
		const departing = i >= state.window ? history[i - state.window] : undefined;
		value = state.update(history[i], departing);
	}
	return value;
};
