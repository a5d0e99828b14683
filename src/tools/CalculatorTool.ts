/**
 * @fileoverview Calculator Tool
 *
 * Arithmetic, scientific functions, unit and temperature conversion,
 * percentages, statistics and random numbers.
 */

import { BaseTool } from './BaseTool';
import { clarify, fail, ok } from './outcome';
import { IntentSchema, ToolOutcome } from './types';
import { evaluateExpression, formatNumber } from './expression';
import { convertTemperature, convertUnits, temperatureScale, TEMPERATURE_SYMBOLS } from './units';
import { Entities } from '../intent/types';
import { entityString } from '../intent/entities';
import { isArray, isNumber, isString, toInteger, toNumber } from '../types/TypeGuards';
import { errorMessage } from '../errors/AssistantErrors';

const SCIENTIFIC_FUNCTIONS: Record<string, { label: (value: string) => string; apply: (value: number) => number }> = {
  sin: { label: (v) => `sin(${v}°)`, apply: (v) => Math.sin((v * Math.PI) / 180) },
  cos: { label: (v) => `cos(${v}°)`, apply: (v) => Math.cos((v * Math.PI) / 180) },
  tan: { label: (v) => `tan(${v}°)`, apply: (v) => Math.tan((v * Math.PI) / 180) },
  log: { label: (v) => `log(${v})`, apply: Math.log10 },
  ln: { label: (v) => `ln(${v})`, apply: Math.log },
  sqrt: { label: (v) => `√${v}`, apply: Math.sqrt },
  exp: { label: (v) => `e^${v}`, apply: Math.exp }
};

const FUNCTION_ALIASES: Record<string, string> = {
  sine: 'sin',
  cosine: 'cos',
  tangent: 'tan',
  logarithm: 'log',
  natural_log: 'ln',
  square_root: 'sqrt',
  exponential: 'exp'
};

type RandomSource = () => number;

export class CalculatorTool extends BaseTool {
  readonly name = 'calculator';
  readonly description = '提供基础数学计算、科学计算、单位转换等功能';

  constructor(private readonly random: RandomSource = Math.random) {
    super();
  }

  getSupportedIntents(): readonly string[] {
    return [
      'calculate',
      'calculate_basic',
      'calculate_scientific',
      'convert_units',
      'convert_temperature',
      'calculate_percentage',
      'calculate_statistics',
      'generate_random'
    ];
  }

  getKeywords(): readonly string[] {
    return ['计算', '算', '数学', '统计', '随机数', '百分比'];
  }

  getIntentSchemas(): readonly IntentSchema[] {
    return [
      {
        intent: 'calculate',
        description: 'Evaluate an arithmetic expression',
        parameters: { expression: { type: 'string', description: 'Expression such as "2 + 3 * 4"' } },
        required: ['expression']
      },
      {
        intent: 'calculate_scientific',
        description: 'Apply a scientific function to a number',
        parameters: {
          function: {
            type: 'string',
            description: 'Function name',
            enum: ['sin', 'cos', 'tan', 'log', 'ln', 'sqrt', 'exp', 'factorial']
          },
          value: { type: 'number', description: 'Input value; degrees for trigonometric functions' }
        },
        required: ['function', 'value']
      },
      {
        intent: 'convert_units',
        description: 'Convert a length, weight, area or volume',
        parameters: {
          value: { type: 'number', description: 'Amount to convert' },
          from_unit: { type: 'string', description: 'Source unit, for example km or 千米' },
          to_unit: { type: 'string', description: 'Target unit' }
        },
        required: ['value', 'from_unit', 'to_unit']
      },
      {
        intent: 'convert_temperature',
        description: 'Convert a temperature between Celsius, Fahrenheit and Kelvin',
        parameters: {
          value: { type: 'number', description: 'Temperature value' },
          from_unit: { type: 'string', description: 'Source scale (c, f, k or 摄氏度/华氏度/开尔文)' },
          to_unit: { type: 'string', description: 'Target scale' }
        },
        required: ['value', 'from_unit', 'to_unit']
      },
      {
        intent: 'calculate_percentage',
        description: 'Percentage of a value, increase, decrease or ratio',
        parameters: {
          operation: { type: 'string', description: 'Kind of calculation', enum: ['of', 'increase', 'decrease', 'ratio'] },
          value1: { type: 'number', description: 'Base value' },
          value2: { type: 'number', description: 'Second value for ratio' },
          percentage: { type: 'number', description: 'Percentage' }
        },
        required: ['value1']
      },
      {
        intent: 'calculate_statistics',
        description: 'Mean, median, mode and standard deviation of numbers',
        parameters: {
          numbers: { type: 'array', description: 'Numbers to summarize', items: { type: 'number' } },
          operation: { type: 'string', description: 'Statistic', enum: ['mean', 'median', 'mode', 'std', 'all'] }
        },
        required: ['numbers']
      },
      {
        intent: 'generate_random',
        description: 'Random integers in a range',
        parameters: {
          min: { type: 'integer', description: 'Lower bound, default 1' },
          max: { type: 'integer', description: 'Upper bound, default 100' },
          count: { type: 'integer', description: 'How many numbers, default 1' }
        }
      }
    ];
  }

  protected async handle(intent: string, entities: Entities): Promise<ToolOutcome> {
    switch (intent) {
      case 'calculate':
      case 'calculate_basic':
        return this.calculateBasic(entities);
      case 'calculate_scientific':
        return this.calculateScientific(entities);
      case 'convert_units':
        return this.convertUnits(entities);
      case 'convert_temperature':
        return this.convertTemperature(entities);
      case 'calculate_percentage':
        return this.calculatePercentage(entities);
      case 'calculate_statistics':
        return this.calculateStatistics(entities);
      case 'generate_random':
        return this.generateRandom(entities);
      default:
        return fail('unsupported_operation', `unsupported_operation: ${intent}`);
    }
  }

  private calculateBasic(entities: Entities): ToolOutcome {
    const expression = entityString(entities, 'expression') ?? entityString(entities, 'text');
    if (!expression) {
      return clarify('expression_missing', '请提供要计算的表达式');
    }

    try {
      const result = formatNumber(evaluateExpression(expression));
      return ok(`calculation_result: ${result}`, `计算结果: ${expression} = ${result}`);
    } catch (error) {
      const message = errorMessage(error);
      return fail('invalid_expression', message, `计算表达式错误: ${message}`);
    }
  }

  private calculateScientific(entities: Entities): ToolOutcome {
    const rawName = entityString(entities, 'function')?.toLowerCase();
    const value = toNumber(entities.value);
    if (!rawName || entities.value === undefined || entities.value === null) {
      return clarify('function_or_value_missing', '请指定计算函数和数值');
    }
    if (value === undefined) {
      return fail('invalid_value', 'invalid_value', '输入的值无效，请输入数字。');
    }

    const name = FUNCTION_ALIASES[rawName] ?? rawName;
    if (name === 'factorial') {
      if (!Number.isInteger(value) || value < 0) {
        return fail('invalid_factorial_input', 'invalid_factorial_input', '阶乘只能计算非负整数');
      }
      let result = 1;
      for (let i = 2; i <= value; i++) {
        result *= i;
      }
      return ok(`scientific_calculation_result: ${formatNumber(result)}`, `${value}! = ${formatNumber(result)}`);
    }

    const fn = SCIENTIFIC_FUNCTIONS[name];
    if (!fn) {
      return fail('unsupported_function', `unsupported_function: ${rawName}`, `不支持的科学计算函数: ${rawName}`);
    }
    const result = fn.apply(value);
    if (!Number.isFinite(result)) {
      return fail('invalid_value', 'invalid_value', `科学计算错误: ${fn.label(String(value))} 无意义`);
    }
    const formatted = formatNumber(result);
    return ok(`scientific_calculation_result: ${formatted}`, `${fn.label(String(value))} = ${formatted}`);
  }

  private convertUnits(entities: Entities): ToolOutcome {
    const value = toNumber(entities.value);
    const fromUnit = entityString(entities, 'from_unit');
    const toUnit = entityString(entities, 'to_unit');
    if (value === undefined || !fromUnit || !toUnit) {
      return clarify('conversion_parameters_missing', '请提供数值、源单位和目标单位');
    }

    const conversion = convertUnits(value, fromUnit, toUnit);
    if (!conversion) {
      return fail(
        'unsupported_conversion',
        `unsupported_conversion: ${fromUnit} -> ${toUnit}`,
        `不支持从 ${fromUnit} 到 ${toUnit} 的转换`
      );
    }
    const result = formatNumber(conversion.result);
    return ok(
      `unit_conversion_result: ${result} ${toUnit}`,
      `${conversion.label}转换: ${value} ${fromUnit} = ${result} ${toUnit}`
    );
  }

  private convertTemperature(entities: Entities): ToolOutcome {
    const value = toNumber(entities.value);
    const fromName = entityString(entities, 'from_unit');
    const toName = entityString(entities, 'to_unit');
    if (value === undefined || !fromName || !toName) {
      return clarify('temperature_parameters_missing', '请提供温度值、源单位和目标单位');
    }

    const from = temperatureScale(fromName);
    if (!from) {
      return fail('unsupported_temperature_unit', `unsupported_temperature_unit: ${fromName}`, `不支持的温度单位: ${fromName}`);
    }
    const to = temperatureScale(toName);
    if (!to) {
      return fail('unsupported_temperature_unit', `unsupported_temperature_unit: ${toName}`, `不支持的温度单位: ${toName}`);
    }

    const result = convertTemperature(value, from, to).toFixed(2);
    const symbol = TEMPERATURE_SYMBOLS[to];
    return ok(
      `temperature_conversion_result: ${result} ${symbol}`,
      `温度转换: ${value}${TEMPERATURE_SYMBOLS[from]} = ${result} ${symbol}`
    );
  }

  private calculatePercentage(entities: Entities): ToolOutcome {
    const operation = entityString(entities, 'operation') ?? 'of';
    const value1 = toNumber(entities.value1);
    const value2 = toNumber(entities.value2);
    const percentage = toNumber(entities.percentage);

    if (operation === 'of' && value1 !== undefined && percentage !== undefined) {
      const result = formatNumber((percentage / 100) * value1);
      return ok(`percentage_result: ${result}`, `${value1} 的 ${percentage}% = ${result}`);
    }
    if (operation === 'increase' && value1 !== undefined && percentage !== undefined) {
      const result = formatNumber(value1 * (1 + percentage / 100));
      return ok(`percentage_increase_result: ${result}`, `${value1} 增加 ${percentage}% = ${result}`);
    }
    if (operation === 'decrease' && value1 !== undefined && percentage !== undefined) {
      const result = formatNumber(value1 * (1 - percentage / 100));
      return ok(`percentage_decrease_result: ${result}`, `${value1} 减少 ${percentage}% = ${result}`);
    }
    if (operation === 'ratio' && value1 !== undefined && value2 !== undefined) {
      if (value2 === 0) {
        return fail('division_by_zero', 'division_by_zero', '除数不能为零');
      }
      const result = ((value1 / value2) * 100).toFixed(2);
      return ok(`percentage_ratio_result: ${result}%`, `${value1} 是 ${value2} 的 ${result}%`);
    }
    return clarify('invalid_percentage_parameters', '请提供正确的百分比计算参数');
  }

  private calculateStatistics(entities: Entities): ToolOutcome {
    const raw = entities.numbers;
    let values: Array<number | undefined>;
    if (isString(raw)) {
      values = raw.split(/[,，\s]+/).filter((part) => part !== '').map((part) => toNumber(part));
    } else if (isArray(raw)) {
      values = raw.map((item) => toNumber(item));
    } else {
      return clarify('numbers_missing', '请提供数字列表');
    }

    const numbers = values.filter(isNumber);
    if (numbers.length !== values.length) {
      return fail('invalid_numbers', 'invalid_numbers', '数字列表中包含无效的值');
    }
    if (numbers.length === 0) {
      return clarify('numbers_missing', '请提供数字列表');
    }

    const operation = entityString(entities, 'operation') ?? 'all';
    const lines: string[] = [];
    const sum = numbers.reduce((total, n) => total + n, 0);
    const mean = sum / numbers.length;

    if (operation === 'mean' || operation === 'all') {
      lines.push(`平均值: ${mean.toFixed(2)}`);
    }
    if (operation === 'median' || operation === 'all') {
      const sorted = [...numbers].sort((a, b) => a - b);
      const mid = Math.floor(sorted.length / 2);
      const median = sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
      lines.push(`中位数: ${median.toFixed(2)}`);
    }
    if (operation === 'mode' || operation === 'all') {
      const counts = new Map<number, number>();
      for (const n of numbers) {
        counts.set(n, (counts.get(n) ?? 0) + 1);
      }
      const maxCount = Math.max(...counts.values());
      const modes = [...counts.entries()].filter(([, count]) => count === maxCount).map(([n]) => formatNumber(n));
      lines.push(`众数: ${modes.join(', ')}`);
    }
    if (operation === 'std' || operation === 'all') {
      const variance = numbers.reduce((total, n) => total + (n - mean) ** 2, 0) / numbers.length;
      lines.push(`标准差: ${Math.sqrt(variance).toFixed(2)}`);
    }
    if (operation === 'all') {
      lines.push(`最小值: ${formatNumber(Math.min(...numbers))}`);
      lines.push(`最大值: ${formatNumber(Math.max(...numbers))}`);
      lines.push(`总和: ${formatNumber(sum)}`);
      lines.push(`数量: ${numbers.length}`);
    }
    if (lines.length === 0) {
      return fail('unsupported_statistic', `unsupported_statistic: ${operation}`, `不支持的统计类型: ${operation}`);
    }

    return ok(`statistics_calculated: ${operation}`, `统计结果:\n${lines.join('\n')}`);
  }

  private generateRandom(entities: Entities): ToolOutcome {
    const min = entities.min === undefined ? 1 : toInteger(entities.min);
    const max = entities.max === undefined ? 100 : toInteger(entities.max);
    const count = entities.count === undefined ? 1 : toInteger(entities.count);
    if (min === undefined || max === undefined || count === undefined || count < 1 || min > max) {
      return fail('invalid_random_parameters', 'invalid_random_parameters', '随机数参数无效');
    }

    const results: number[] = [];
    for (let i = 0; i < count; i++) {
      results.push(min + Math.floor(this.random() * (max - min + 1)));
    }

    if (count === 1) {
      return ok(`random_number: ${results[0]}`, `随机数 (${min}-${max}): ${results[0]}`);
    }
    return ok(`random_numbers: ${results.join(', ')}`, `${count}个随机数 (${min}-${max}): ${results.join(', ')}`);
  }
}
