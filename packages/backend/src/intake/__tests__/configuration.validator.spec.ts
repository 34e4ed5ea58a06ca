import { findConfigurationProblems, orderedFields, validateFormConfiguration } from '../configuration.validator';
import { ConfigurationError } from '../intake.errors';
import { FieldType } from '../intake.types';
import { createFormConfiguration } from './__mocks__/test-utils';

describe('configuration validator', () => {
  it('should accept a well-formed configuration', () => {
    expect(findConfigurationProblems(createFormConfiguration())).toEqual([]);
  });

  it('should require at least one field', () => {
    expect(findConfigurationProblems(createFormConfiguration({ fields: [] }))).toEqual([
      'at least one field is required',
    ]);
  });

  it('should report duplicate keys, bad keys and missing labels', () => {
    const problems = findConfigurationProblems(
      createFormConfiguration({
        fields: [
          { key: 'email', label: 'Email', type: FieldType.EMAIL, required: true },
          { key: 'email', label: 'Email again', type: FieldType.EMAIL, required: false },
          { key: '2nd', label: ' ', type: FieldType.TEXT, required: false },
        ],
      }),
    );

    expect(problems).toEqual([
      'field #2 (email): duplicate key',
      'field #3 (2nd): key must start with a letter and contain only letters, digits or _',
      'field #3 (2nd): label is required',
    ]);
  });

  it('should require choices on choice fields', () => {
    const problems = findConfigurationProblems(
      createFormConfiguration({
        fields: [
          { key: 'service', label: 'Service', type: FieldType.CHOICE, required: true, choices: [] },
          { key: 'rooms', label: 'Rooms', type: FieldType.MULTICHOICE, required: false, choices: ['A', 'a'] },
        ],
      }),
    );

    expect(problems).toEqual([
      'field #1 (service): choice fields need at least one choice',
      'field #2 (rooms): duplicate choices',
    ]);
  });

  it('should throw ConfigurationError listing the problems', () => {
    const config = createFormConfiguration();
    config.agent.name = '';

    expect(() => validateFormConfiguration(config)).toThrow(ConfigurationError);
    expect(() => validateFormConfiguration(config)).toThrow('Invalid form configuration: agent name is required');
  });

  it('should order fields by order, then declaration', () => {
    const config = createFormConfiguration();
    config.fields[1].order = 5;

    expect(orderedFields(config).map((field) => field.key)).toEqual(['full_name', 'email', 'phone']);
  });
});
