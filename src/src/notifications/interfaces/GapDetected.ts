export interface GapDetected {
    readonly topic: string;
    readonly expected: number;
    readonly actual: number;
}
