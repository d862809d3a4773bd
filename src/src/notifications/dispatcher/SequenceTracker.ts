import type { GapDetected } from '../interfaces/GapDetected.js';

export interface SequencePolicy {
    /** Treat `4294967295 -> 0` as continuous. */
    readonly wrapAround: boolean;
}

const UINT32_MODULUS = 2 ** 32;

export class SequenceTracker {
    private readonly lastSeen: Map<string, number> = new Map();

    constructor(private readonly policy: SequencePolicy = { wrapAround: true }) {}

    /**
     * Records `sequence` as the latest value of `topic`.
     * Returns the gap when it does not directly follow the previous value.
     */
    public observe(topic: string, sequence: number): GapDetected | undefined {
        const last = this.lastSeen.get(topic);
        this.lastSeen.set(topic, sequence);

        if (last === undefined) {
            return;
        }

        const expected = this.policy.wrapAround ? (last + 1) % UINT32_MODULUS : last + 1;
        if (sequence === expected) {
            return;
        }

        return { topic, expected, actual: sequence };
    }

    public lastSequence(topic: string): number | undefined {
        return this.lastSeen.get(topic);
    }

    public reset(): void {
        this.lastSeen.clear();
    }
}
