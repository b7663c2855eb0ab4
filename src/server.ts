/**
 * Inglish Translator - HTTP server entry point
 */

import 'dotenv/config';
import { loadConfig, validateConfig, hasAIProvider } from './config.js';
import { createApp } from './app.js';

// Load configuration
const config = loadConfig();
const configValidation = validateConfig(config);

for (const error of configValidation.errors) {
  console.warn(`[Config] ${error}`);
}

const app = createApp(config);

app.listen(config.port, () => {
  console.log(`
╔═══════════════════════════════════════════════════════════╗
║                    Inglish Translator                     ║
╠═══════════════════════════════════════════════════════════╣
║   Server:     http://localhost:${config.port}
║   Domain:     ${config.translation.defaultDomain} (${config.translation.defaultTargetLanguage})
║   Translator: ${config.translation.defaultTranslator}
║   AI:         ${hasAIProvider(config) ? `OpenAI (${config.openai.model})` : 'not configured'}
╚═══════════════════════════════════════════════════════════╝
`);
});
