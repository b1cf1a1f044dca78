// src/ai/ai.constants.ts
export const OPENAI_CLIENT = 'OPENAI_CLIENT';
export const AI_SETTINGS = 'AI_SETTINGS';
