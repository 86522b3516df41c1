import { readFileSync } from 'fs';
import { logger } from '../config/logger.js';
import type { SchemaValidator } from '../contracts/schema-validator.js';
import { createRuleConfig } from './config.js';
import type { RuleConfig } from './types.js';

export class RuleConfigLoadError extends Error {
    constructor(
        public readonly rulesPath: string,
        message: string,
    ) {
        super(`Failed to load rules from ${rulesPath}: ${message}`);
        this.name = 'RuleConfigLoadError';
    }
}

export function loadRules(rulesPath: string, validator: SchemaValidator): Readonly<RuleConfig> {
    let content: unknown;
    try {
        content = JSON.parse(readFileSync(rulesPath, 'utf-8'));
    } catch (err) {
        logger.error({ rulesPath, error: err }, 'Failed to read rules');
        throw new RuleConfigLoadError(rulesPath, err instanceof Error ? err.message : String(err));
    }

    const result = validator.validateRuleConfig(content);
    if (!result.valid) {
        logger.error({ rulesPath, errors: result.errors }, 'Rules failed schema validation');
        throw new RuleConfigLoadError(rulesPath, result.errors);
    }

    // Invariant violations surface as RuleConfigError, before any series runs
    const rules = createRuleConfig(result.data);
    logger.info({ rulesPath, rules }, 'Rules loaded successfully');

    return rules;
}
