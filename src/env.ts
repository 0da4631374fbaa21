import { config as dotenvConfig } from 'dotenv';

// Imported first by the entry point so LOG_LEVEL is set before the logger loads
dotenvConfig({ path: '.env.local' });
dotenvConfig(); // Fallback to .env
