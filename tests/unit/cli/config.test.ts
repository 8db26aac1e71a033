import { describe, it, expect } from 'vitest';
import { renderConfig } from '../../../src/cli/commands/config.js';
import { DEFAULT_CONFIG } from '../../../src/config/config.js';

describe('renderConfig', () => {
  it('should print the configuration as indented JSON', () => {
    const rendered = renderConfig(DEFAULT_CONFIG);

    expect(JSON.parse(rendered)).toEqual(DEFAULT_CONFIG);
    expect(rendered.split('\n')[1]).toBe('  "logging": {');
  });

  it('should include the classifier endpoint when configured', () => {
    const rendered = renderConfig({
      ...DEFAULT_CONFIG,
      backends: { ...DEFAULT_CONFIG.backends, classifier_url: 'http://127.0.0.1:8500' },
    });

    expect(JSON.parse(rendered)).toMatchObject({
      backends: { ollama_url: 'http://127.0.0.1:11434', classifier_url: 'http://127.0.0.1:8500' },
    });
  });
});
