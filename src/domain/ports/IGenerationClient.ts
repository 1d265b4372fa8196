import { GeneratedImage } from '../entities/ConversationSession';

/**
 * Reference image bytes handed to the upstream.
 */
export interface ReferenceImagePayload {
    data: Buffer;
    mimeType: string;
}

/**
 * IGenerationClient - Port for the upstream prompt enhancement and image generation API.
 * Implementations: LeonardoGenerationClient
 *
 * Stateless. Throws ValidationError for bad input and UpstreamError for failed calls.
 * Performs no retries of its own.
 */
export interface IGenerationClient {
    /**
     * Asks the upstream to refine a prompt.
     * @returns The enhanced prompt text
     */
    enhance(prompt: string): Promise<string>;

    /**
     * Generates one image, optionally conditioned on a reference image.
     */
    generate(prompt: string, referenceImage?: ReferenceImagePayload): Promise<GeneratedImage>;
}
