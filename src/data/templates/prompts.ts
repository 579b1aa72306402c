// src/data/templates/prompts.ts

import type { CandidateRepository } from '@/types';

export const CONTENT_GENERATION_PROMPTS = {
    /**
     * Promotional tweet about a trending repository
     */
    promoteRepository: (repo: CandidateRepository, maxLength: number, maxHashtags: number) => `
Create an engaging technical tweet about this open-source project:
- Project: ${repo.name}
- Language: ${repo.language}
- Stars: ${repo.stars}
- Description: ${repo.description || 'No description available.'}
- URL: ${repo.url}

Guidelines:
- Keep under ${maxLength - 30} characters
- Highlight technical merits
- Include relevant hashtags (max ${maxHashtags})
- Emphasize why developers should check it out
- Use emojis sparingly
- Reply with the tweet text only
`.trim()
};

export const FALLBACK_TEMPLATES = {
    /**
     * Used when the local model is unreachable or returns nothing usable
     */
    promoteRepository: (repo: CandidateRepository) => {
        const description = (repo.description || 'A valuable open-source project').substring(0, 100);
        return `🚀 Check out ${repo.name} - ${description}\n\n⭐ ${repo.stars} stars | ${repo.language}\n#OpenSource #GitHub`;
    },

    linkReply: (repo: CandidateRepository) => `🔗 ${repo.url}`
};
