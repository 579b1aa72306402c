// src/services/ai/content-generator.ts

import axios, { type AxiosInstance } from 'axios';
import type { ApiResponse, CandidateRepository, GeneratedPost } from '@/types';
import { config } from '@/config';
import { API_ENDPOINTS, DEFAULT_HEADERS, REQUEST_TIMEOUTS, TWEET_LIMITS } from '@/config/apis';
import { CONTENT_GENERATION_PROMPTS, FALLBACK_TEMPLATES } from '@/data/templates/prompts';
import { createApiResponse, stringUtils } from '@/utils/helpers';
import { createServiceLogger, logApiRequest } from '@/utils/logger';

const logger = createServiceLogger('ContentGenerator');

export type OllamaHttpClient = Pick<AxiosInstance, 'post'>;

interface OllamaGenerateResponse {
    model?: string;
    response?: string;
    done?: boolean;
}

const createOllamaClient = (): AxiosInstance => {
    const instance = axios.create({
        baseURL: API_ENDPOINTS.ollama.baseUrl,
        timeout: REQUEST_TIMEOUTS.ollama,
        headers: DEFAULT_HEADERS.ollama
    });

    instance.interceptors.response.use(
        (response) => {
            logApiRequest('ollama', response.config.url || '',
                response.config.method?.toUpperCase() || 'POST',
                response.status);
            return response;
        },
        (error) => {
            if (axios.isAxiosError(error)) {
                logApiRequest('ollama', error.config?.url || '',
                    error.config?.method?.toUpperCase() || 'POST',
                    error.response?.status);
            }
            return Promise.reject(error);
        }
    );

    return instance;
};

export class ContentGeneratorService {
    private http: OllamaHttpClient;
    private model: string;

    constructor(http?: OllamaHttpClient, model: string = config.ai.model) {
        this.http = http ?? createOllamaClient();
        this.model = model;
    }

    /**
     * Generate promotional text for a repository, falling back to a template
     * when the model fails
     */
    public async generatePost(repo: CandidateRepository): Promise<ApiResponse<GeneratedPost>> {
        logger.info('Generating post content', { repository: repo.id, model: this.model });

        const aiResponse = await this.callModel(
            CONTENT_GENERATION_PROMPTS.promoteRepository(repo, TWEET_LIMITS.maxLength, TWEET_LIMITS.maxHashtags)
        );

        if (aiResponse.successful && aiResponse.data) {
            const text = this.sanitizeTweet(aiResponse.data);
            if (text) {
                logger.info('Post content generated', { repository: repo.id, length: text.length });
                return createApiResponse(true, 'Post content generated', { text, candidate: repo, source: 'model' });
            }
            logger.warn('Model output was empty after sanitizing', { repository: repo.id });
        } else {
            logger.warn('Model generation failed, using fallback content', {
                repository: repo.id,
                error: aiResponse.error
            });
        }

        const fallback = stringUtils.truncate(FALLBACK_TEMPLATES.promoteRepository(repo), TWEET_LIMITS.maxLength);
        return createApiResponse(true, 'Fallback content generated', { text: fallback, candidate: repo, source: 'fallback' });
    }

    /**
     * Clean up generated tweet text
     */
    public sanitizeTweet(raw: string): string {
        const cleaned = (raw.split('```')[0] ?? '')
            .replace(/\*\*/g, '')
            .trim()
            .replace(/^["'“](.*)["'”]$/s, '$1')
            .trim();

        return stringUtils.truncate(cleaned, TWEET_LIMITS.maxLength);
    }

    private async callModel(prompt: string): Promise<ApiResponse<string | undefined>> {
        try {
            const response = await this.http.post<OllamaGenerateResponse>(API_ENDPOINTS.ollama.generate, {
                model: this.model,
                prompt,
                stream: false,
                options: {
                    num_predict: TWEET_LIMITS.maxLength,
                    temperature: 0.7
                }
            });

            const content = response.data?.response;
            if (!content || !content.trim()) {
                return createApiResponse(false, 'Empty model response', undefined, 'Model returned empty content');
            }

            return createApiResponse(true, 'Model content generated', content.trim());
        } catch (error: unknown) {
            const errMsg = error instanceof Error ? error.message : String(error);

            if (axios.isAxiosError(error)) {
                if (error.code === 'ECONNREFUSED') {
                    return createApiResponse(false, 'Model server unreachable', undefined, `No Ollama server at ${API_ENDPOINTS.ollama.baseUrl}`);
                }
                if (error.response?.status === 404) {
                    return createApiResponse(false, 'Model not found', undefined, `Pull ${this.model} with Ollama first`);
                }
            }

            return createApiResponse(false, 'Model call failed', undefined, errMsg);
        }
    }
}

export const contentGenerator = new ContentGeneratorService();
export default contentGenerator;
