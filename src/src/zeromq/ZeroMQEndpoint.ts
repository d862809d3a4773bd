export const SUPPORTED_SCHEMES: readonly string[] = ['tcp://', 'ipc://', 'inproc://'];

export function isZeroMQEndpoint(endpoint: string): boolean {
    return SUPPORTED_SCHEMES.some((scheme) => endpoint.startsWith(scheme));
}
