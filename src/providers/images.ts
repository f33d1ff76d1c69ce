/**
 * 图片引用编码
 *
 * 引用可以是 data URI、http(s) URL 或本地文件路径；本地文件读取后编码为 base64 data URI。
 */

import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { InvalidParameterError } from './types';

const IMAGE_MIME_TYPES: Record<string, string> = {
    '.png': 'image/png',
    '.jpg': 'image/jpeg',
    '.jpeg': 'image/jpeg',
    '.gif': 'image/gif',
    '.webp': 'image/webp',
};

export function isDataUri(reference: string): boolean {
    return reference.startsWith('data:');
}

export function isRemoteUrl(reference: string): boolean {
    return /^https?:\/\//i.test(reference);
}

export function getImageMimeType(filePath: string): string | undefined {
    return IMAGE_MIME_TYPES[extname(filePath).toLowerCase()];
}

/**
 * data URI 解码后的字节数；格式不合法时返回 undefined
 */
export function dataUriByteLength(dataUri: string): number | undefined {
    const match = /^data:[^;,]*;base64,(.*)$/s.exec(dataUri);
    if (!match || match[1] === undefined) {
        return undefined;
    }
    return Buffer.from(match[1], 'base64').length;
}

/**
 * @throws InvalidParameterError 不支持的格式或不可读的文件
 */
export async function encodeImage(reference: string): Promise<string> {
    if (isDataUri(reference) || isRemoteUrl(reference)) {
        return reference;
    }

    const mimeType = getImageMimeType(reference);
    if (!mimeType) {
        throw new InvalidParameterError(`Unsupported image format: ${reference}`, 'images');
    }

    let bytes: Buffer;
    try {
        bytes = await readFile(reference);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new InvalidParameterError(`Image file is not readable: ${reference} (${reason})`, 'images');
    }
    return `data:${mimeType};base64,${bytes.toString('base64')}`;
}
