import { registerAs } from '@nestjs/config';

export default registerAs('ollama', () => {
  const defaultModel = process.env.OLLAMA_MODEL || 'llama3.2:3b';

  return {
    url: process.env.OLLAMA_URL || 'http://localhost:11434',
    // Per-field model selection; sex and race are cheap closed-set calls.
    models: {
      sex: process.env.OLLAMA_MODEL_SEX || defaultModel,
      race: process.env.OLLAMA_MODEL_RACE || defaultModel,
      age: process.env.OLLAMA_MODEL_AGE || defaultModel,
    },
    timeout: parseInt(process.env.OLLAMA_TIMEOUT || '30000', 10),
    enabled: process.env.OLLAMA_ENABLED !== 'false',   // default ON
    autoPull: process.env.OLLAMA_AUTO_PULL === 'true', // default OFF
  };
});
