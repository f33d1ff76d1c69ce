/**
 * 图片数量与大小校验
 *
 * 在调用后端之前按模型能力检查图片：模型是否可用、是否支持图片、总大小是否超限。
 */

import { stat } from 'node:fs/promises';
import { dataUriByteLength, isDataUri, isRemoteUrl } from '../providers';
import type { ProviderRegistry } from '../providers';
import { toolError } from './tool-output';
import type { ToolOutput } from './tool-output';

const BYTES_PER_MB = 1024 * 1024;

type ImageSize = { ok: true; bytes: number } | { ok: false; output: ToolOutput };

async function measureImage(reference: string): Promise<ImageSize> {
    if (isDataUri(reference)) {
        const bytes = dataUriByteLength(reference);
        if (bytes === undefined) {
            return { ok: false, output: toolError('Invalid image data URI', { errorType: 'validation_error' }) };
        }
        return { ok: true, bytes };
    }

    // 远程图片无法在本地测量，由后端自行限制
    if (isRemoteUrl(reference)) {
        return { ok: true, bytes: 0 };
    }

    try {
        const info = await stat(reference);
        return { ok: true, bytes: info.size };
    } catch {
        return {
            ok: false,
            output: toolError(`Image file is not accessible: ${reference}`, {
                errorType: 'validation_error',
                image: reference,
            }),
        };
    }
}

/**
 * @returns 校验通过（或没有图片）时返回 null，否则返回错误载荷
 */
export async function validateImageLimits(
    images: readonly string[] | undefined,
    modelName: string,
    registry: ProviderRegistry
): Promise<ToolOutput | null> {
    if (!images || images.length === 0) {
        return null;
    }

    const provider = registry.getProviderForModel(modelName);
    if (!provider) {
        return toolError(`Model '${modelName}' is not available`, { errorType: 'validation_error', modelName });
    }

    const capabilities = provider.getCapabilities(modelName);
    if (!capabilities.supportsImages) {
        return toolError(`Model '${modelName}' does not support image processing`, {
            errorType: 'validation_error',
            modelName: capabilities.modelName,
            supportsImages: false,
        });
    }

    let totalBytes = 0;
    for (const image of images) {
        const size = await measureImage(image);
        if (!size.ok) {
            return size.output;
        }
        totalBytes += size.bytes;
    }

    const totalMb = totalBytes / BYTES_PER_MB;
    if (totalMb > capabilities.maxImageSizeMb) {
        return toolError(
            `Image size limit exceeded: ${totalMb.toFixed(1)}MB exceeds the ${capabilities.maxImageSizeMb}MB limit for model '${capabilities.modelName}'`,
            {
                errorType: 'validation_error',
                modelName: capabilities.modelName,
                totalSizeMb: Number(totalMb.toFixed(2)),
                limitMb: capabilities.maxImageSizeMb,
                imageCount: images.length,
            }
        );
    }

    return null;
}
