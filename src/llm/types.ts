export interface GenerationRequest {
  prompt: string;
  /** JSON schema (OpenAPI 3 flavour) describing the expected response. */
  responseSchema?: object;
  signal?: AbortSignal;
}

/**
 * Anything that turns a prompt into raw text. Output is untrusted: it may be
 * truncated, malformed, or off-schema, and callers validate it themselves.
 * Implementations throw UpstreamUnavailableError when the service cannot be reached.
 */
export interface TextGenerator {
  readonly model: string;
  generate(request: GenerationRequest): Promise<string>;
}
