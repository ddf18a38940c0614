/**
 * Inference backend types
 */

export const BACKEND_REQUESTS = ['auto', 'standard', 'generation-engine'] as const;

export type BackendRequest = (typeof BACKEND_REQUESTS)[number];

// `auto` only exists until the backend selector has run
export type ResolvedBackend = Exclude<BackendRequest, 'auto'>;

/**
 * Legacy backend names accepted on the command line
 */
export const BACKEND_ALIASES: Record<string, BackendRequest> = {
  huggingface: 'standard',
  vllm: 'generation-engine',
};

export function parseBackendName(name: string): BackendRequest | undefined {
  return (
    BACKEND_REQUESTS.find((backend) => backend === name) ??
    (Object.hasOwn(BACKEND_ALIASES, name) ? BACKEND_ALIASES[name] : undefined)
  );
}
