import Ajv2020Lib from 'ajv/dist/2020.js';
import addFormatsLib from 'ajv-formats';
import type { ValidateFunction } from 'ajv';

const Ajv2020 = Ajv2020Lib.default;
const addFormats = addFormatsLib.default;
import { readFileSync, existsSync, readdirSync } from 'fs';
import { join } from 'path';
import { logger } from '../config/logger.js';
import type { RuleConfigInput } from '../rules/config.js';
import type { EvaluateRequest, SeriesEvaluatedEvent, SeriesSubmittedEvent } from './events.js';

export const SCHEMA_BASE = 'https://reserve-alert-engine.example.com/schemas';

export const SCHEMA_IDS = {
    ruleConfig: `${SCHEMA_BASE}/rules/rule-config.json`,
    seriesSubmitted: `${SCHEMA_BASE}/events/series-submitted.json`,
    seriesEvaluated: `${SCHEMA_BASE}/events/series-evaluated.json`,
    evaluateRequest: `${SCHEMA_BASE}/http/evaluate-request.json`,
} as const;

export type ValidationResult<T> =
    | { valid: true; data: T }
    | { valid: false; errors: string };

export class SchemaValidator {
    private ajv: InstanceType<typeof Ajv2020>;
    private schemasLoaded = false;

    constructor(private contractsPath: string) {
        // Initialize Ajv with 2020-12 support
        this.ajv = new Ajv2020({
            validateSchema: false, // Disable schema validation to avoid meta-schema issues
            strict: false,
            allErrors: true,
        });
        addFormats(this.ajv);
    }

    /**
     * Load all JSON schemas from the contracts directory
     */
    loadSchemas(): void {
        if (!existsSync(this.contractsPath)) {
            logger.error({ path: this.contractsPath }, 'Contracts directory not found');
            return;
        }

        const files = this.getAllJsonFiles(this.contractsPath);
        logger.info({ count: files.length, path: this.contractsPath }, 'Loading schemas');

        files.forEach((file) => {
            try {
                const schema: unknown = JSON.parse(readFileSync(file, 'utf-8'));

                if (typeof schema === 'object' && schema !== null && '$id' in schema && typeof schema.$id === 'string') {
                    const $id: string = schema.$id;
                    this.ajv.addSchema({ ...schema, $id });
                    logger.debug({ $id, file }, 'Schema loaded');
                } else {
                    logger.warn({ file }, 'Schema missing $id, skipped');
                }
            } catch (err) {
                logger.error({ file, error: err }, 'Failed to load schema');
            }
        });

        this.schemasLoaded = true;
        logger.info('All schemas loaded successfully');
    }

    /**
     * Recursively get all JSON files from a directory
     */
    private getAllJsonFiles(dir: string): string[] {
        const files: string[] = [];

        for (const entry of readdirSync(dir, { withFileTypes: true })) {
            const fullPath = join(dir, entry.name);

            if (entry.isDirectory()) {
                files.push(...this.getAllJsonFiles(fullPath));
            } else if (entry.isFile() && entry.name.endsWith('.json')) {
                files.push(fullPath);
            }
        }

        return files;
    }

    /**
     * Validate data against a schema by its $id
     */
    validate<T>(schemaId: string, data: unknown): ValidationResult<T> {
        if (!this.schemasLoaded) {
            logger.warn('Schemas not loaded, validation will fail');
            return { valid: false, errors: 'Schemas not loaded' };
        }

        const validateFn: ValidateFunction<T> | undefined = this.ajv.getSchema<T>(schemaId);

        if (!validateFn) {
            logger.error({ schemaId }, 'Schema not found');
            return { valid: false, errors: `Schema not found: ${schemaId}` };
        }

        if (!validateFn(data)) {
            return { valid: false, errors: this.ajv.errorsText(validateFn.errors) };
        }

        return { valid: true, data };
    }

    validateRuleConfig(data: unknown): ValidationResult<RuleConfigInput> {
        return this.validate<RuleConfigInput>(SCHEMA_IDS.ruleConfig, data);
    }

    validateSeriesSubmitted(data: unknown): ValidationResult<SeriesSubmittedEvent> {
        return this.validate<SeriesSubmittedEvent>(SCHEMA_IDS.seriesSubmitted, data);
    }

    validateSeriesEvaluated(data: unknown): ValidationResult<SeriesEvaluatedEvent> {
        return this.validate<SeriesEvaluatedEvent>(SCHEMA_IDS.seriesEvaluated, data);
    }

    validateEvaluateRequest(data: unknown): ValidationResult<EvaluateRequest> {
        return this.validate<EvaluateRequest>(SCHEMA_IDS.evaluateRequest, data);
    }
}
