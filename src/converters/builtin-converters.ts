import { ValueTypes } from '../value-type';
import type { ConverterProvider } from './converter-registry';
import type { ValueConverter } from './value-converter';

export class BooleanToStringConverter implements ValueConverter<boolean, string> {
  convert(value: boolean): string {
    return value ? 'True' : 'False';
  }

  convertBack(value: string): boolean {
    return value.trim().toLowerCase() === 'true';
  }
}

/** Renders without decimals; unparsable text converts back to 0. */
export class NumberToStringConverter implements ValueConverter<number, string> {
  convert(value: number): string {
    return value.toFixed(0);
  }

  convertBack(value: string): number {
    const parsed = Number.parseFloat(value);

    return Number.isNaN(parsed) ? 0 : parsed;
  }
}

export class IntegerToStringConverter implements ValueConverter<number, string> {
  convert(value: number): string {
    return String(Math.trunc(value));
  }

  convertBack(value: string): number {
    const parsed = Number.parseInt(value, 10);

    return Number.isNaN(parsed) ? 0 : parsed;
  }
}

export const registerBuiltinConverters: ConverterProvider = (registry) => {
  registry.register(ValueTypes.boolean, ValueTypes.string, BooleanToStringConverter);
  registry.register(ValueTypes.number, ValueTypes.string, NumberToStringConverter);
  registry.register(ValueTypes.integer, ValueTypes.string, IntegerToStringConverter);
};
