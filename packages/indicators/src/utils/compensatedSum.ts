/**
 * Neumaier-compensated running sum. Keeps SMA sums from drifting when values
 * are added and removed for millions of ticks.
 */
export class CompensatedSum {
	private sum = 0;
	private compensation = 0;

	add(value: number): void {
		const next = this.sum + value;
		if (Math.abs(this.sum) >= Math.abs(value)) {
			this.compensation += this.sum - next + value;
		} else {
			this.compensation += value - next + this.sum;
		}
		this.sum = next;
	}

	subtract(value: number): void {
		this.add(-value);
	}

	get value(): number {
		return this.sum + this.compensation;
	}

	reset(): void {
		this.sum = 0;
		this.compensation = 0;
	}
}
