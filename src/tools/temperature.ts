/**
 * 工具层的温度选择
 */

import {
    InvalidParameterError,
    correctTemperature,
    defaultTemperature,
    describeTemperatureConstraint,
    validateTemperature,
} from '../providers';
import type { ModelCapabilities } from '../providers';
import { toToolError } from './tool-output';
import type { ToolOutput } from './tool-output';

export type TemperatureResolution = { ok: true; temperature: number } | { ok: false; output: ToolOutput };

/**
 * 未给出时使用模型默认值；固定温度模型始终使用固定值；区间外的值返回错误载荷
 */
export function resolveTemperature(capabilities: ModelCapabilities, requested?: number): TemperatureResolution {
    const constraint = capabilities.temperatureConstraint;

    if (requested === undefined) {
        return { ok: true, temperature: defaultTemperature(constraint) };
    }
    if (constraint.type === 'fixed' || validateTemperature(constraint, requested)) {
        return { ok: true, temperature: correctTemperature(constraint, requested) };
    }

    const output = toToolError(
        new InvalidParameterError(
            `Temperature ${requested} is invalid for model ${capabilities.modelName}: must be ${describeTemperatureConstraint(constraint)}`,
            'temperature',
            { temperature: describeTemperatureConstraint(constraint) }
        )
    );
    output.metadata.suggestedTemperature = correctTemperature(constraint, requested);
    return { ok: false, output };
}
