import { ConfigurationError } from '../intake.errors';
import { FieldType } from '../intake.types';
import { generateClosing, generateGreeting, generateSystemPrompt } from '../prompt-generator';
import { createFormConfiguration } from './__mocks__/test-utils';

describe('prompt generator', () => {
  describe('generateSystemPrompt', () => {
    it('should mention the persona, the business and every field label', () => {
      const prompt = generateSystemPrompt(createFormConfiguration());

      expect(prompt).toContain('You are Ava, a conversational intake assistant for Acme Plumbing.');
      expect(prompt).toContain('About the business: Emergency plumbing repairs');
      expect(prompt).toContain('Full name');
      expect(prompt).toContain('Phone number');
      expect(prompt).toContain('Email address');
    });

    it('should describe each field with its type hint and whether it is required', () => {
      const prompt = generateSystemPrompt(createFormConfiguration());

      expect(prompt).toContain("- Full name (a person's full name), required");
      expect(prompt).toContain('- Email address (an email address; confirm the spelling), optional');
    });

    it('should list choice options', () => {
      const config = createFormConfiguration({
        fields: [
          {
            key: 'service',
            label: 'Service needed',
            type: FieldType.CHOICE,
            required: true,
            choices: ['Repair', 'Installation'],
          },
        ],
      });

      expect(generateSystemPrompt(config)).toContain('options: Repair, Installation');
    });

    it('should follow field order', () => {
      const config = createFormConfiguration();
      config.fields[2].order = -1;

      const prompt = generateSystemPrompt(config);

      expect(prompt.indexOf('Email address')).toBeLessThan(prompt.indexOf('Full name'));
    });

    it('should list values already collected', () => {
      const prompt = generateSystemPrompt(createFormConfiguration(), {
        collected: { full_name: 'Jane Doe' },
      });

      expect(prompt).toContain('**Already collected**');
      expect(prompt).toContain('- Full name: Jane Doe');
      expect(prompt).not.toContain('- Phone number: ');
    });

    it('should not list inherited object members as collected', () => {
      const config = createFormConfiguration({
        fields: [{ key: 'constructor', label: 'Builder company', type: FieldType.TEXT, required: true }],
      });
      const prompt = generateSystemPrompt(config, { collected: {} });

      expect(prompt).not.toContain('Already collected');
      expect(prompt).not.toContain('- Builder company: ');
    });

    it('should omit the collected section when nothing is collected', () => {
      expect(generateSystemPrompt(createFormConfiguration())).not.toContain('Already collected');
    });

    it('should name the conversation language', () => {
      const config = createFormConfiguration();
      config.agent.language = 'es';

      expect(generateSystemPrompt(config)).toContain('Always reply in Spanish.');
    });

    it('should be deterministic', () => {
      const config = createFormConfiguration();

      expect(generateSystemPrompt(config)).toBe(generateSystemPrompt(config));
    });

    it('should reject a configuration without fields', () => {
      expect(() => generateSystemPrompt(createFormConfiguration({ fields: [] }))).toThrow(ConfigurationError);
    });
  });

  describe('generateGreeting', () => {
    it('should build a default greeting from the persona', () => {
      expect(generateGreeting(createFormConfiguration())).toBe(
        "Hi, I'm Ava from Acme Plumbing. I'll help you get started. How can I help you today?",
      );
    });

    it('should prefer a custom greeting', () => {
      const config = createFormConfiguration();
      config.agent.greeting = '  Thanks for calling Acme!  ';

      expect(generateGreeting(config)).toBe('Thanks for calling Acme!');
    });
  });

  describe('generateClosing', () => {
    it('should mention the business by default', () => {
      expect(generateClosing(createFormConfiguration())).toBe(
        'Thank you! I have everything I need. Someone from Acme Plumbing will be in touch soon.',
      );
    });
  });
});
