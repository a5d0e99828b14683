/**
 * Unit conversion for spoken (Chinese) unit names, e.g. "转换 5 公里到米"
 */

import { BaseTool } from './BaseTool';
import { fail, ok } from './outcome';
import { IntentSchema, ToolOutcome } from './types';
import { convertUnits } from './units';
import { Entities } from '../intent/types';
import { entityString } from '../intent/entities';
import { toNumber } from '../types/TypeGuards';

export class UnitConversionTool extends BaseTool {
  readonly name = 'unit_conversion';
  readonly description = '提供常用的单位转换功能，例如长度、重量等。';

  getSupportedIntents(): readonly string[] {
    return ['convert_unit'];
  }

  getKeywords(): readonly string[] {
    return ['转换', '换算', '单位'];
  }

  getIntentSchemas(): readonly IntentSchema[] {
    return [
      {
        intent: 'convert_unit',
        description: 'Convert a value between two units of length, weight, area or volume',
        parameters: {
          value: { type: 'number', description: 'Amount to convert' },
          from_unit: { type: 'string', description: 'Source unit, for example 米 or 公斤' },
          to_unit: { type: 'string', description: 'Target unit' }
        },
        required: ['value', 'from_unit', 'to_unit']
      }
    ];
  }

  protected async handle(intent: string, entities: Entities): Promise<ToolOutcome> {
    const missing = this.requireEntities(entities, ['value', 'from_unit', 'to_unit']);
    if (missing) {
      return missing;
    }

    const value = toNumber(entities.value);
    if (value === undefined) {
      return fail('invalid_value_for_conversion', 'invalid_value_for_conversion', '输入的值无效，请输入数字。');
    }

    const fromUnit = entityString(entities, 'from_unit') ?? '';
    const toUnit = entityString(entities, 'to_unit') ?? '';
    const conversion = convertUnits(value, fromUnit, toUnit);
    if (!conversion) {
      return fail(
        'unsupported_conversion',
        `unsupported_conversion: ${fromUnit}_to_${toUnit}`,
        `抱歉，不支持从 ${fromUnit} 到 ${toUnit} 的转换。`
      );
    }

    const result = conversion.result.toFixed(2);
    return ok(`conversion_result: ${result} ${toUnit}`, `${value} ${fromUnit} 等于 ${result} ${toUnit}`);
  }
}
