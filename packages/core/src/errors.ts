export type IngestErrorCode = "InvalidValue" | "MissingField" | "StaleTimestamp";
export type ConfigErrorCode = "PeriodExceedsCapacity" | "InvalidConfig";
export type DispatchErrorCode = "UnknownInstrument" | "LaneClosed" | "AlreadyStreaming";

/**
 * Base class for every failure the engine reports. Per-tick failures are
 * returned or counted, never thrown past the dispatcher.
 */
export class EngineError<Code extends string = string> extends Error {
	readonly code: Code;
	readonly details: Record<string, unknown>;

	constructor(code: Code, message: string, details: Record<string, unknown> = {}) {
		super(message);
		this.name = new.target.name;
		this.code = code;
		this.details = details;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			code: this.code,
			message: this.message,
			...this.details,
		};
	}
}

export class IngestError extends EngineError<IngestErrorCode> {}

export class ConfigError extends EngineError<ConfigErrorCode> {}

export class DispatchError extends EngineError<DispatchErrorCode> {}

export class OverflowPolicyTriggered extends EngineError<"OverflowPolicyTriggered"> {
	constructor(message: string, details: Record<string, unknown> = {}) {
		super("OverflowPolicyTriggered", message, details);
	}
}

export const describeError = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);
