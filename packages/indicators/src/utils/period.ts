import { ConfigError } from "@tickscope/core";

export const assertPeriod = (label: string, period: number): number => {
	if (!Number.isInteger(period) || period <= 0) {
		throw new ConfigError(
			"InvalidConfig",
			`${label} period must be a positive integer, got ${period}`,
			{ indicator: label, period }
		);
	}
	return period;
};
