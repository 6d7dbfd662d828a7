import { IsString, IsNumber, Min } from 'class-validator';
import { validateConfig } from './config-validation';
import { ConfigurationError } from '../common/errors';

class TestConfig {
  @IsString()
  name!: string;

  @IsNumber()
  @Min(0)
  value!: number;
}

describe('ConfigValidation', () => {
  it('should validate correct configuration', () => {
    const config = { name: 'test', value: 10 };
    const result = validateConfig(config, 'test', TestConfig);

    expect(result).toBeInstanceOf(TestConfig);
    expect(result.name).toBe('test');
    expect(result.value).toBe(10);
  });

  it('should convert string values implicitly', () => {
    const result = validateConfig({ name: 'test', value: '12' }, 'test', TestConfig);
    expect(result.value).toBe(12);
  });

  it('should throw error for invalid configuration', () => {
    const config = { name: 'test', value: -1 };

    expect(() => {
      validateConfig(config, 'test', TestConfig);
    }).toThrow('Invalid configuration for test: value must not be less than 0');
  });

  it('should throw error for missing required fields', () => {
    const config = { value: 10 };

    expect(() => {
      validateConfig(config, 'test', TestConfig);
    }).toThrow(ConfigurationError);
  });

  it('should list every failed constraint', () => {
    let caught: unknown;
    try {
      validateConfig({ value: -1 }, 'test', TestConfig);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    if (caught instanceof ConfigurationError) {
      expect(caught.section).toBe('test');
      expect(caught.problems).toEqual(['name must be a string', 'value must not be less than 0']);
    }
  });
});
