import axios from 'axios';
import FormData from 'form-data';
import { GeneratedImage } from '../../domain/entities/ConversationSession';
import { UpstreamError, UpstreamOperation, ValidationError, isRetryableStatus } from '../../domain/errors/ConversationErrors';
import { IGenerationClient, ReferenceImagePayload } from '../../domain/ports/IGenerationClient';
import { describeHttpError, isRecord, readPath, readString } from '../http/JsonReaders';

export interface LeonardoClientOptions {
    baseUrl?: string;
    /** Model used for plain text-to-image generations */
    modelId?: string;
    /** Model used when a reference image conditions the generation */
    referenceModelId?: string;
    width?: number;
    height?: number;
    /** Per-request timeout in milliseconds */
    timeoutMs?: number;
    /** Delay between generation status polls */
    pollIntervalMs?: number;
    /** Status polls before the generation counts as timed out */
    maxPolls?: number;
    /** Largest reference image accepted, in bytes */
    maxReferenceBytes?: number;
}

type ImageExtension = 'jpg' | 'png' | 'webp';

const DEFAULTS: Required<LeonardoClientOptions> = {
    baseUrl: 'https://cloud.leonardo.ai/api/rest/v1',
    modelId: '6b645e3a-d64f-4341-a6d8-7a3690fbf042',
    referenceModelId: 'e71a1c2f-4f80-4800-934f-2c68979d8cc8',
    width: 1040,
    height: 512,
    timeoutMs: 30000,
    pollIntervalMs: 2000,
    maxPolls: 30,
    maxReferenceBytes: 10 * 1024 * 1024,
};

/** Style Reference preprocessor */
const STYLE_REFERENCE_PREPROCESSOR_ID = 67;

/**
 * Leonardo.ai client for prompt enhancement and image generation.
 *
 * Generations are asynchronous upstream: the create call returns a generation id
 * which is polled until it completes. Reference images are uploaded first through
 * a presigned form, then attached as init image and style-reference controlnet.
 */
export class LeonardoGenerationClient implements IGenerationClient {
    private readonly apiKey: string;
    private readonly options: Required<LeonardoClientOptions>;

    constructor(apiKey: string, options: LeonardoClientOptions = {}) {
        if (!apiKey) {
            throw new Error('Leonardo API key is required');
        }
        this.apiKey = apiKey;
        this.options = { ...DEFAULTS, ...options };
    }

    async enhance(prompt: string): Promise<string> {
        if (!prompt || prompt.trim().length === 0) {
            throw new ValidationError('Prompt is required for enhancement');
        }

        try {
            const response = await axios.post(
                `${this.options.baseUrl}/prompt/improve`,
                { prompt },
                { headers: this.headers(), timeout: this.options.timeoutMs }
            );

            const enhanced = readString(response.data, 'promptGeneration', 'prompt');
            if (!enhanced) {
                throw new UpstreamError('enhance', 'Leonardo returned no enhanced prompt');
            }
            return enhanced;
        } catch (error) {
            if (error instanceof UpstreamError) {
                throw error;
            }
            const message = describeHttpError(error);
            if (axios.isAxiosError(error) && error.response?.status === 400 && message.toLowerCase().includes('too long')) {
                throw new ValidationError(
                    `📝 Your prompt is too long to enhance (${prompt.length} characters). Please try again with a shorter description.`
                );
            }
            throw this.toUpstreamError('enhance', error);
        }
    }

    async generate(prompt: string, referenceImage?: ReferenceImagePayload): Promise<GeneratedImage> {
        if (!prompt || prompt.trim().length === 0) {
            throw new ValidationError('Prompt is required for image generation');
        }
        const extension = referenceImage ? this.validateReference(referenceImage) : undefined;

        let payload: Record<string, unknown> = {
            height: this.options.height,
            width: this.options.width,
            modelId: this.options.modelId,
            prompt,
            photoReal: false,
            guidance_scale: 8,
            num_images: 1,
        };

        if (referenceImage && extension) {
            const initImageId = await this.uploadReference(referenceImage.data, extension);
            payload = {
                ...payload,
                modelId: this.options.referenceModelId,
                init_image_id: initImageId,
                init_strength: 0.05,
                controlnets: [
                    {
                        initImageId,
                        initImageType: 'UPLOADED',
                        preprocessorId: STYLE_REFERENCE_PREPROCESSOR_ID,
                        strengthType: 'Low',
                    },
                ],
                guidance_scale: 9,
                presetStyle: 'DYNAMIC',
            };
        }

        const generationId = await this.createGeneration(payload);
        console.log(`[Leonardo] Generation ${generationId} started${referenceImage ? ' with reference image' : ''}`);

        return this.waitForGeneration(generationId);
    }

    private async createGeneration(payload: Record<string, unknown>): Promise<string> {
        try {
            const response = await axios.post(
                `${this.options.baseUrl}/generations`,
                payload,
                { headers: this.headers(), timeout: this.options.timeoutMs }
            );
            const generationId = readString(response.data, 'sdGenerationJob', 'generationId');
            if (!generationId) {
                throw new UpstreamError('generate', 'Leonardo returned no generation id');
            }
            return generationId;
        } catch (error) {
            if (error instanceof UpstreamError) {
                throw error;
            }
            // Without a response the job may still have been created; a retry could bill a second one.
            throw this.toUpstreamError('generate', error, false);
        }
    }

    private async waitForGeneration(generationId: string): Promise<GeneratedImage> {
        for (let poll = 1; poll <= this.options.maxPolls; poll++) {
            await sleep(this.options.pollIntervalMs);

            let body: unknown;
            try {
                const response = await axios.get(
                    `${this.options.baseUrl}/generations/${generationId}`,
                    { headers: this.headers(), timeout: this.options.timeoutMs }
                );
                body = response.data;
            } catch (error) {
                const upstream = this.toUpstreamError('generate', error);
                if (!upstream.retryable) {
                    throw upstream;
                }
                console.warn(`[Leonardo] Status poll ${poll}/${this.options.maxPolls} for ${generationId} failed: ${upstream.message}`);
                continue;
            }

            const status = readString(body, 'generations_by_pk', 'status');
            if (status === 'FAILED') {
                throw new UpstreamError('generate', `Leonardo reported generation ${generationId} as failed`);
            }
            if (status === 'COMPLETE') {
                const url = firstImageUrl(readPath(body, 'generations_by_pk', 'generated_images'));
                if (!url) {
                    throw new UpstreamError('generate', `Generation ${generationId} completed without images`);
                }
                return { url, generationId };
            }
        }

        throw new UpstreamError(
            'generate',
            `Generation ${generationId} did not complete after ${this.options.maxPolls} status checks`
        );
    }

    /**
     * Uploads the reference through Leonardo's presigned form.
     * @returns The init image id to reference in the generation
     */
    private async uploadReference(data: Buffer, extension: ImageExtension): Promise<string> {
        let uploadUrl: string | undefined;
        let fields: Record<string, unknown> | undefined;
        let imageId: string | undefined;

        try {
            const response = await axios.post(
                `${this.options.baseUrl}/init-image`,
                { extension },
                { headers: this.headers(), timeout: this.options.timeoutMs }
            );
            uploadUrl = readString(response.data, 'uploadInitImage', 'url');
            imageId = readString(response.data, 'uploadInitImage', 'id');
            fields = parseFields(readPath(response.data, 'uploadInitImage', 'fields'));
        } catch (error) {
            throw this.toUpstreamError('upload', error);
        }

        if (!uploadUrl || !imageId || !fields) {
            throw new UpstreamError('upload', 'Leonardo returned an incomplete upload form');
        }

        const form = new FormData();
        for (const [key, value] of Object.entries(fields)) {
            form.append(key, String(value));
        }
        form.append('file', data, { filename: `image.${extension}`, contentType: contentTypeOf(extension) });

        try {
            await axios.post(uploadUrl, form, {
                headers: form.getHeaders(),
                timeout: this.options.timeoutMs,
                maxBodyLength: Infinity,
                maxContentLength: Infinity,
            });
        } catch (error) {
            throw this.toUpstreamError('upload', error);
        }

        console.log(`[Leonardo] Uploaded reference image ${imageId}`);
        return imageId;
    }

    private validateReference(image: ReferenceImagePayload): ImageExtension {
        if (image.data.length === 0) {
            throw new ValidationError('⚠️ The reference image is empty. Please upload another one.');
        }
        if (image.data.length > this.options.maxReferenceBytes) {
            throw new ValidationError('⚠️ The reference image is too large. Please upload a smaller one.');
        }
        const extension = detectImageExtension(image.data);
        if (!extension) {
            throw new ValidationError('⚠️ The reference image is not a valid JPEG, PNG or WebP file. Please upload another one.');
        }
        return extension;
    }

    private toUpstreamError(operation: UpstreamOperation, error: unknown, retryableWithoutResponse: boolean = true): UpstreamError {
        if (axios.isAxiosError(error)) {
            const status = error.response?.status;
            const isTimeout = error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT';
            const reason = isTimeout ? 'request timed out' : describeHttpError(error);
            console.error(`[Leonardo] ${operation} failed (${status ?? error.code ?? 'network'}): ${reason}`);
            return new UpstreamError(
                operation,
                `Leonardo ${operation} failed${status ? ` (${status})` : ''}: ${reason}`,
                status,
                status === undefined ? retryableWithoutResponse : isRetryableStatus(status)
            );
        }
        const message = error instanceof Error ? error.message : 'Unknown error';
        return new UpstreamError(operation, `Leonardo ${operation} failed: ${message}`);
    }

    private headers(): Record<string, string> {
        return {
            accept: 'application/json',
            'content-type': 'application/json',
            authorization: `Bearer ${this.apiKey}`,
        };
    }
}

/**
 * Identifies an image by its leading bytes.
 */
export function detectImageExtension(data: Buffer): ImageExtension | null {
    if (data.length >= 3 && data[0] === 0xff && data[1] === 0xd8 && data[2] === 0xff) {
        return 'jpg';
    }
    if (data.length >= 8 && data.subarray(0, 8).equals(Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]))) {
        return 'png';
    }
    if (data.length >= 12 && data.toString('ascii', 0, 4) === 'RIFF' && data.toString('ascii', 8, 12) === 'WEBP') {
        return 'webp';
    }
    return null;
}

function contentTypeOf(extension: ImageExtension): string {
    return extension === 'jpg' ? 'image/jpeg' : `image/${extension}`;
}

/**
 * Presigned form fields arrive as a JSON-encoded string.
 */
function parseFields(value: unknown): Record<string, unknown> | undefined {
    if (isRecord(value)) {
        return value;
    }
    if (typeof value !== 'string') {
        return undefined;
    }
    try {
        const parsed: unknown = JSON.parse(value);
        return isRecord(parsed) ? parsed : undefined;
    } catch {
        return undefined;
    }
}

function firstImageUrl(images: unknown): string | undefined {
    if (!Array.isArray(images) || images.length === 0) {
        return undefined;
    }
    return readString(images[0], 'url');
}

function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}
