// src/database/database.constants.ts
export const DATABASE_CONFIG = 'DATABASE_CONFIG';
export const CHAT_STORAGE = 'CHAT_STORAGE';
export const CHAT_REPOSITORY_FACTORY = 'CHAT_REPOSITORY_FACTORY';
