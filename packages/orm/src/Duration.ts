export type DurationInit = {
	days?: number
	hours?: number
	minutes?: number
	seconds?: number
	milliseconds?: number
	microseconds?: number
}

const MICROSECONDS_PER_MILLISECOND = 1000
const MICROSECONDS_PER_SECOND = 1000 * MICROSECONDS_PER_MILLISECOND
const MICROSECONDS_PER_MINUTE = 60 * MICROSECONDS_PER_SECOND
const MICROSECONDS_PER_HOUR = 60 * MICROSECONDS_PER_MINUTE
const MICROSECONDS_PER_DAY = 24 * MICROSECONDS_PER_HOUR

/** An immutable span of time with microsecond resolution. */
export class Duration {
	public static readonly zero = new Duration(0)

	public static from({
		days = 0,
		hours = 0,
		minutes = 0,
		seconds = 0,
		milliseconds = 0,
		microseconds = 0,
	}: DurationInit): Duration {
		return new Duration(
			days * MICROSECONDS_PER_DAY +
				hours * MICROSECONDS_PER_HOUR +
				minutes * MICROSECONDS_PER_MINUTE +
				seconds * MICROSECONDS_PER_SECOND +
				milliseconds * MICROSECONDS_PER_MILLISECOND +
				microseconds,
		)
	}

	constructor(public readonly microseconds: number) {
		if (!Number.isSafeInteger(microseconds)) {
			throw new TypeError("duration must be a safely representable integer number of microseconds")
		}
	}

	public get milliseconds(): number {
		return Math.trunc(this.microseconds / MICROSECONDS_PER_MILLISECOND)
	}

	public get seconds(): number {
		return Math.trunc(this.microseconds / MICROSECONDS_PER_SECOND)
	}

	public get minutes(): number {
		return Math.trunc(this.microseconds / MICROSECONDS_PER_MINUTE)
	}

	public equals(other: Duration): boolean {
		return this.microseconds === other.microseconds
	}

	public toString(): string {
		const sign = this.microseconds < 0 ? "-" : ""
		const total = Math.abs(this.microseconds)
		const hours = Math.floor(total / MICROSECONDS_PER_HOUR)
		const minutes = Math.floor((total % MICROSECONDS_PER_HOUR) / MICROSECONDS_PER_MINUTE)
		const seconds = Math.floor((total % MICROSECONDS_PER_MINUTE) / MICROSECONDS_PER_SECOND)
		const micros = total % MICROSECONDS_PER_SECOND
		const pad = (n: number, width: number) => n.toString().padStart(width, "0")
		return `${sign}${hours}:${pad(minutes, 2)}:${pad(seconds, 2)}.${pad(micros, 6)}`
	}
}
