/**
 * Environment variable parsing with range checks.
 * Invalid values fall back to the default with a console warning, since these run before any logger exists.
 */

interface NumberOptions {
  min?: number;
  max?: number;
  fieldName?: string;
}

export class EnvironmentUtils {
  static parseInt(key: string, defaultValue: number, options: NumberOptions = {}): number {
    return EnvironmentUtils.parseNumber(key, defaultValue, options, value => Number.parseInt(value, 10), "integer");
  }

  static parseFloat(key: string, defaultValue: number, options: NumberOptions = {}): number {
    return EnvironmentUtils.parseNumber(key, defaultValue, options, value => Number.parseFloat(value), "float");
  }

  static parseBoolean(key: string, defaultValue: boolean, options: { fieldName?: string } = {}): boolean {
    const value = process.env[key];
    if (!value) return defaultValue;

    const lowerValue = value.toLowerCase();
    if (lowerValue === "true" || lowerValue === "1" || lowerValue === "yes") {
      return true;
    }
    if (lowerValue === "false" || lowerValue === "0" || lowerValue === "no") {
      return false;
    }

    console.warn(`Invalid boolean value "${value}" for ${options.fieldName || key}, using default ${defaultValue}`);
    return defaultValue;
  }

  static parseString(
    key: string,
    defaultValue: string,
    options: {
      pattern?: RegExp;
      fieldName?: string;
    } = {}
  ): string {
    const value = process.env[key];
    if (!value) return defaultValue;

    if (options.pattern && !options.pattern.test(value)) {
      console.warn(`Value for ${options.fieldName || key} doesn't match pattern, using default`);
      return defaultValue;
    }

    return value;
  }

  /**
   * Comma-separated list; blank items are dropped.
   */
  static parseList(key: string, defaultValue: string[] = []): string[] {
    const value = process.env[key];
    if (!value) return defaultValue;

    const items = value
      .split(",")
      .map(item => item.trim())
      .filter(Boolean);
    return items.length > 0 ? items : defaultValue;
  }

  private static parseNumber(
    key: string,
    defaultValue: number,
    options: NumberOptions,
    parse: (value: string) => number,
    label: string
  ): number {
    const value = process.env[key];
    if (!value) return defaultValue;

    const fieldName = options.fieldName || key;
    const parsed = parse(value);
    if (Number.isNaN(parsed)) {
      console.warn(`Invalid ${label} value "${value}" for ${fieldName}, using default ${defaultValue}`);
      return defaultValue;
    }

    if (options.min !== undefined && parsed < options.min) {
      console.warn(`Value ${parsed} for ${fieldName} is below minimum ${options.min}, using default ${defaultValue}`);
      return defaultValue;
    }

    if (options.max !== undefined && parsed > options.max) {
      console.warn(`Value ${parsed} for ${fieldName} is above maximum ${options.max}, using default ${defaultValue}`);
      return defaultValue;
    }

    return parsed;
  }
}
