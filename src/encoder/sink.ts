/**
 * Output Sinks
 */

/**
 * Appendable destination for encoded fragments
 *
 * The encoder writes each fragment as soon as it is produced and never
 * takes one back.
 */
export interface OutputSink {
	write(fragment: string): void;
}

/**
 * Collects fragments in memory and joins them on demand
 */
export class StringSink implements OutputSink {
	private readonly fragments: string[] = [];

	write(fragment: string): void {
		this.fragments.push(fragment);
	}

	toString(): string {
		return this.fragments.join("");
	}
}
