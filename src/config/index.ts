import * as dotenv from 'dotenv';
import { loadConfig } from './loader.js';

// Load environment variables
dotenv.config();

export const config = loadConfig(process.env);
