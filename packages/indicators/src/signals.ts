import { buy, NO_ACTION, sell, type Action } from "@indicore/core";

/**
 * Buy when `current` crosses above zero, sell when it crosses below.
 * Touching zero does not count as a cross.
 */
export const zeroCross = (previous: number, current: number): Action => {
	if (previous <= 0 && current > 0) {
		return buy();
	}
	if (previous >= 0 && current < 0) {
		return sell();
	}
	return NO_ACTION;
};
