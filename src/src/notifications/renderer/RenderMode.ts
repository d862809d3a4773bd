export enum RenderMode {
    Hex = 'hex',
    Raw = 'raw',
    Utf8IfPrintable = 'utf8-if-printable',
}

const RENDER_MODES: ReadonlySet<string> = new Set(Object.values(RenderMode));

export function isRenderMode(value: unknown): value is RenderMode {
    return typeof value === 'string' && RENDER_MODES.has(value);
}

export function parseRenderMode(value: string): RenderMode {
    const normalized = value.trim().toLowerCase();
    if (!isRenderMode(normalized)) {
        throw new Error(
            `Unknown render mode "${value}", expected one of ${[...RENDER_MODES].join(', ')}`,
        );
    }

    return normalized;
}
