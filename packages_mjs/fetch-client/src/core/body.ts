/**
 * Body encoding: picks one body strategy from the argument bag.
 */
import { Blob } from 'node:buffer';
import { createReadStream } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { Readable } from 'node:stream';
import { FormData, Response } from 'undici';
import { FORM_CONTENT_TYPE, JSON_CONTENT_TYPE } from '../config.js';
import { EncodingError, IOError } from '../errors.js';
import { BodySource, FileField, JsonPayload, RequestArguments } from '../types.js';
import { encodeForm } from './url.js';

export interface EncodedBody {
    body: Buffer | Readable | null;
    contentType?: string;
    contentLength?: number;
}

const EMPTY_BODY: EncodedBody = { body: null };

function buffered(bytes: Buffer, contentType?: string): EncodedBody {
    return { body: bytes, contentType, contentLength: bytes.length };
}

/**
 * Destroy the streams behind `files`. Path-backed parts hold nothing open.
 */
export function releaseFiles(files: FileField[] = []): void {
    for (const field of files) {
        if ('content' in field && !field.content.destroyed) field.content.destroy();
    }
}

/**
 * Resolve the body in priority order: body, json, files, data.
 * The argument bag is never mutated; file streams of a losing files
 * strategy are released.
 */
export async function encodeBody(args: RequestArguments): Promise<EncodedBody> {
    if (args.body) {
        releaseFiles(args.files);
        return encodeSource(args.body);
    }
    if (args.json) {
        releaseFiles(args.files);
        return buffered(encodeJson(args.json), JSON_CONTENT_TYPE);
    }
    if (args.files) {
        return encodeMultipart(args.files, args.data ?? {});
    }
    if (args.data) {
        return buffered(Buffer.from(encodeForm(args.data)), FORM_CONTENT_TYPE);
    }
    return EMPTY_BODY;
}

async function encodeSource(source: BodySource): Promise<EncodedBody> {
    switch (source.kind) {
        case 'text':
            return buffered(Buffer.from(source.text));
        case 'bytes':
            return buffered(Buffer.from(source.bytes));
        case 'stream':
            return { body: source.stream };
        case 'file':
            try {
                return buffered(await readFile(source.path));
            } catch (e) {
                throw new IOError(`Failed to read body file '${source.path}'`, e);
            }
    }
}

export function encodeJson(payload: JsonPayload): Buffer {
    switch (payload.kind) {
        case 'text':
            return Buffer.from(payload.text);
        case 'bytes':
            return Buffer.from(payload.bytes);
        case 'structured': {
            let text: string | undefined;
            try {
                text = JSON.stringify(payload.value);
            } catch (e) {
                throw new EncodingError('Failed to serialize JSON body', e);
            }
            if (text === undefined) {
                throw new EncodingError(`Value of type ${typeof payload.value} is not JSON-serializable`);
            }
            return Buffer.from(text);
        }
    }
}

async function readPart(field: FileField): Promise<Buffer> {
    const chunks: Buffer[] = [];
    let source: Readable | undefined;
    try {
        source = 'path' in field ? createReadStream(field.path) : field.content;
        for await (const chunk of source) {
            chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
        }
    } catch (e) {
        throw new IOError(`Failed to read file '${field.fileName}' for field '${field.fieldName}'`, e);
    } finally {
        if (source && !source.destroyed) source.destroy();
    }
    return Buffer.concat(chunks);
}

/**
 * Build a multipart/form-data body. Path-backed parts are opened one at a
 * time; every stream is destroyed whether encoding succeeds or not.
 */
export async function encodeMultipart(files: FileField[], data: Record<string, string>): Promise<EncodedBody> {
    const form = new FormData();
    try {
        for (const field of files) {
            const content = await readPart(field);
            form.append(field.fieldName, new Blob([content]), field.fileName);
        }
    } finally {
        releaseFiles(files);
    }

    for (const [key, value] of Object.entries(data)) {
        form.append(key, value);
    }

    try {
        const serialized = new Response(form);
        const contentType = serialized.headers.get('content-type');
        if (!contentType) {
            throw new Error('multipart writer produced no content type');
        }
        const bytes = Buffer.from(await serialized.arrayBuffer());
        return buffered(bytes, contentType);
    } catch (e) {
        throw new EncodingError('Failed to finalize multipart body', e);
    }
}
