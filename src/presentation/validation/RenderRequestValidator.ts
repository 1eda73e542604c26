import Ajv, { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';
import fs from 'fs';
import path from 'path';
import { RenderRequest } from '../../domain/entities/RenderRequest';
import { ValidationError } from '../../domain/errors/RenderErrors';

/**
 * Request body as it arrives, before defaults are applied.
 */
export interface RenderRequestBody {
    imageUrls: string[];
    timings: Array<{ startSeconds: number; endSeconds: number }>;
    audioUrl: string;
    projectId: string;
    applyEffects?: boolean;
    storage: {
        projectUrl: string;
        serviceKey: string;
        bucket?: string;
    };
    renderJobId?: string;
}

export const RENDER_REQUEST_SCHEMA_PATH = path.resolve(__dirname, '../../../schemas/render-request.schema.json');

function loadSchema(schemaPath: string): SchemaObject {
    const schema: SchemaObject = JSON.parse(fs.readFileSync(schemaPath, 'utf-8'));
    return schema;
}

function describeSchemaError(error: ErrorObject): string {
    const location = error.instancePath || '(body)';
    if (error.keyword === 'additionalProperties' && typeof error.params.additionalProperty === 'string') {
        return `${location} has unknown property "${error.params.additionalProperty}"`;
    }
    return `${location} ${error.message ?? 'is invalid'}`;
}

function checkHttpUrl(value: string, field: string, problems: string[]): void {
    let parsed: URL;
    try {
        parsed = new URL(value);
    } catch {
        problems.push(`${field} must be a valid URL`);
        return;
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
        problems.push(`${field} must use http or https`);
    }
}

/**
 * Turns an untrusted JSON body into a typed RenderRequest.
 * Shape comes from the JSON schema; URLs are parsed here because Ajv
 * has no URL check without extra format plugins.
 */
export class RenderRequestValidator {
    private readonly validateBody: ValidateFunction<RenderRequestBody>;

    constructor(
        private readonly defaultBucket: string,
        schemaPath: string = RENDER_REQUEST_SCHEMA_PATH
    ) {
        const ajv = new Ajv({ allErrors: true });
        this.validateBody = ajv.compile<RenderRequestBody>(loadSchema(schemaPath));
    }

    validate(body: unknown): RenderRequest {
        if (!this.validateBody(body)) {
            const details = (this.validateBody.errors ?? []).map(describeSchemaError);
            throw new ValidationError(`Invalid render request: ${details[0] ?? 'body does not match schema'}`, details);
        }

        const problems: string[] = [];
        body.imageUrls.forEach((url, i) => checkHttpUrl(url, `imageUrls[${i}]`, problems));
        checkHttpUrl(body.audioUrl, 'audioUrl', problems);
        checkHttpUrl(body.storage.projectUrl, 'storage.projectUrl', problems);
        if (problems.length > 0) {
            throw new ValidationError(`Invalid render request: ${problems[0]}`, problems);
        }

        return {
            imageUrls: [...body.imageUrls],
            timings: body.timings.map(({ startSeconds, endSeconds }) => ({ startSeconds, endSeconds })),
            audioUrl: body.audioUrl,
            projectId: body.projectId,
            applyEffects: body.applyEffects ?? false,
            storage: {
                projectUrl: body.storage.projectUrl,
                serviceKey: body.storage.serviceKey,
                bucket: body.storage.bucket ?? this.defaultBucket,
            },
            renderJobId: body.renderJobId,
        };
    }
}
