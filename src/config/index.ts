import dotenv from 'dotenv';
import { loadConfig } from './schema.js';
import type { AppConfig } from './schema.js';

dotenv.config();

export type { AppConfig };

export const config: AppConfig = loadConfig(process.env);
