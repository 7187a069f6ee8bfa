// src/core/renderer/errors.ts

import type { RenderError } from '../../@types/index.js';

function describeCause(cause: unknown): string {
    if (cause instanceof Error) {
        return cause.message;
    }
    return String(cause);
}

export function formatRenderError(error: RenderError): string {
    switch (error.kind) {
        case 'NotFound':
            return `Image '${error.path}' not found.`;
        case 'DecodeError':
            return `Could not decode image '${error.path}': ${describeCause(error.cause)}`;
        case 'InvalidParameter':
            return `Invalid ${error.parameter}: ${error.message}`;
    }
}
