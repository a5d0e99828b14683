/**
 * @fileoverview Unit catalog lookups
 *
 * Each category converts through its base unit: value * factor(from) / factor(to).
 */

import unitTable from './data/units.json';

interface UnitCategory {
  label: string;
  base: string;
  units: Record<string, number>;
}

const CATEGORIES: Record<string, UnitCategory> = unitTable;

export interface UnitConversion {
  category: string;
  label: string;
  result: number;
}

/**
 * Convert between two units of the same category, or undefined when the pair
 * is unknown or spans categories. Unit names are matched case-insensitively.
 */
export function convertUnits(value: number, fromUnit: string, toUnit: string): UnitConversion | undefined {
  const from = fromUnit.trim().toLowerCase();
  const to = toUnit.trim().toLowerCase();

  for (const [category, definition] of Object.entries(CATEGORIES)) {
    const fromFactor = definition.units[from];
    const toFactor = definition.units[to];
    if (fromFactor !== undefined && toFactor !== undefined) {
      return { category, label: definition.label, result: (value * fromFactor) / toFactor };
    }
  }
  return undefined;
}

export function knownUnits(): string[] {
  return Object.values(CATEGORIES).flatMap((definition) => Object.keys(definition.units));
}

export type TemperatureScale = 'celsius' | 'fahrenheit' | 'kelvin';

const TEMPERATURE_NAMES: Record<string, TemperatureScale> = {
  c: 'celsius',
  celsius: 'celsius',
  '摄氏度': 'celsius',
  f: 'fahrenheit',
  fahrenheit: 'fahrenheit',
  '华氏度': 'fahrenheit',
  k: 'kelvin',
  kelvin: 'kelvin',
  '开尔文': 'kelvin'
};

export const TEMPERATURE_SYMBOLS: Record<TemperatureScale, string> = {
  celsius: '°C',
  fahrenheit: '°F',
  kelvin: 'K'
};

export function temperatureScale(name: string): TemperatureScale | undefined {
  return TEMPERATURE_NAMES[name.trim().toLowerCase()];
}

export function convertTemperature(value: number, from: TemperatureScale, to: TemperatureScale): number {
  const celsius = from === 'celsius' ? value : from === 'fahrenheit' ? ((value - 32) * 5) / 9 : value - 273.15;
  switch (to) {
    case 'celsius':
      return celsius;
    case 'fahrenheit':
      return (celsius * 9) / 5 + 32;
    case 'kelvin':
      return celsius + 273.15;
  }
}
