import { ConfigService } from '@nestjs/config';
import { OllamaRequestError, OllamaService } from '../../ollama/ollama.service';
import { ClassifierUnavailableError } from '../engine/errors';
import { SEX_LABELS } from '../engine/registry';
import { OllamaClassifierAdapter } from './ollama-classifier.adapter';

describe('OllamaClassifierAdapter', () => {
  let ollama: OllamaService;
  let generate: jest.SpyInstance<ReturnType<OllamaService['generate']>, Parameters<OllamaService['generate']>>;
  let adapter: OllamaClassifierAdapter;

  beforeEach(() => {
    ollama = new OllamaService(
      new ConfigService({
        ollama: { models: { sex: 'sex-model', race: 'race-model', age: 'age-model' }, enabled: true },
      }),
    );
    generate = jest.spyOn(ollama, 'generate');
    adapter = new OllamaClassifierAdapter(ollama);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  const sexRequest = (value: string) => ({ field: 'sex' as const, value, labels: SEX_LABELS, fallback: 'Unknown' });

  describe('classify', () => {
    it('should send the candidate labels to the field model', async () => {
      generate.mockResolvedValueOnce('Male');

      await expect(adapter.classify(sexRequest('M'))).resolves.toBe('Male');

      const [model, prompt] = generate.mock.calls[0];
      expect(model).toBe('sex-model');
      expect(prompt).toContain('- Male\n- Female\n- Other\n- Unknown');
      expect(prompt).toContain('answer Unknown');
      expect(prompt).toContain('VALUE: "M"');
    });

    it.each([
      ['"Female"', 'Female'],
      ['female.', 'Female'],
      ['**Other**', 'Other'],
      ['`UNKNOWN`', 'Unknown'],
    ])('should normalise the answer %p to %p', async (answer, expected) => {
      generate.mockResolvedValueOnce(answer);
      await expect(adapter.classify(sexRequest('x'))).resolves.toBe(expected);
    });

    it.each(['Man', 'The category is Male', '', 'Male, Female'])(
      'should coerce the malformed answer %p to the fallback',
      async (answer) => {
        generate.mockResolvedValueOnce(answer);
        await expect(adapter.classify(sexRequest('x'))).resolves.toBe('Unknown');
      },
    );

    it('should surface transport failures as ClassifierUnavailableError', async () => {
      generate.mockRejectedValueOnce(new OllamaRequestError('Ollama request timed out after 30000ms', 'sex-model', true));

      const err = await adapter.classify(sexRequest('M')).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ClassifierUnavailableError);
      expect(err).toMatchObject({
        code: 'CLASSIFIER_UNAVAILABLE',
        details: { model: 'sex-model', timedOut: true },
      });
    });

    it('should rethrow unexpected errors untouched', async () => {
      const bug = new TypeError('cannot read properties of undefined');
      generate.mockRejectedValueOnce(bug);
      await expect(adapter.classify(sexRequest('M'))).rejects.toBe(bug);
    });
  });

  describe('extractNumber', () => {
    const request = (value: string) => ({ field: 'age' as const, value, instruction: 'Extract the age.' });

    it('should prefix the value with the instruction and use the age model', async () => {
      generate.mockResolvedValueOnce('45');

      await expect(adapter.extractNumber(request('45 years'))).resolves.toBe('45');
      expect(generate).toHaveBeenCalledWith('age-model', 'Extract the age.\n\nVALUE: "45 years"', {
        temperature: 0,
        maxTokens: 8,
      });
    });

    it.each([
      ['"28"', '28'],
      ['0.', '0'],
      ['invalid', 'INVALID'],
      ['INVALID', 'INVALID'],
    ])('should normalise %p to %p', async (answer, expected) => {
      generate.mockResolvedValueOnce(answer);
      await expect(adapter.extractNumber(request('x'))).resolves.toBe(expected);
    });

    it.each(['NULL', 'about 45', '45 years', '-5', ''])('should coerce %p to INVALID', async (answer) => {
      generate.mockResolvedValueOnce(answer);
      await expect(adapter.extractNumber(request('x'))).resolves.toBe('INVALID');
    });
  });
});
