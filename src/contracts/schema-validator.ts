import Ajv2020Lib from 'ajv/dist/2020.js';
import addFormatsLib from 'ajv-formats';

const Ajv2020 = Ajv2020Lib.default;
const addFormats = addFormatsLib.default;
import { readFileSync, existsSync, readdirSync } from 'fs';
import { join } from 'path';
import { logger } from '../config/logger.js';
import { errorMessage } from '../domain/errors.js';
import {
    SCHEMA_IDS,
    type AlertResolveCommand,
    type DirectorySeed,
    type EmergencyResolveCommand,
    type OtpRequestCommand,
    type OtpResendCommand,
    type OtpVerifyCommand,
    type SosTriggerCommand,
    type ThresholdsCustomClearCommand,
    type ThresholdsCustomSetCommand,
    type ThresholdsSimulateCommand,
    type VitalsRecordedEvent,
} from './messages.js';

export type ValidationResult<T> = { valid: true; data: T } | { valid: false; errors: string };

function hasSchemaId(schema: unknown): schema is { $id: string } {
    return (
        typeof schema === 'object' &&
        schema !== null &&
        '$id' in schema &&
        typeof schema.$id === 'string'
    );
}

export class SchemaValidator {
    private ajv: InstanceType<typeof Ajv2020>;
    private schemasLoaded = false;

    constructor(private contractsPath: string) {
        this.ajv = new Ajv2020({
            validateSchema: false,
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

        for (const file of files) {
            try {
                const schema: unknown = JSON.parse(readFileSync(file, 'utf-8'));

                if (hasSchemaId(schema)) {
                    this.ajv.addSchema(schema);
                    logger.debug({ $id: schema.$id, file }, 'Schema loaded');
                } else {
                    logger.warn({ file }, 'Schema missing $id, skipped');
                }
            } catch (err) {
                logger.error({ file, error: errorMessage(err) }, 'Failed to load schema');
            }
        }

        this.schemasLoaded = true;
        logger.info('All schemas loaded successfully');
    }

    private getAllJsonFiles(dir: string): string[] {
        const files: string[] = [];

        try {
            const entries = readdirSync(dir, { withFileTypes: true });

            for (const entry of entries) {
                const fullPath = join(dir, entry.name);

                if (entry.isDirectory()) {
                    files.push(...this.getAllJsonFiles(fullPath));
                } else if (entry.isFile() && entry.name.endsWith('.json')) {
                    files.push(fullPath);
                }
            }
        } catch (err) {
            logger.error({ dir, error: errorMessage(err) }, 'Failed to read directory');
        }

        return files;
    }

    /**
     * Validate data against a schema by its $id. On success the data comes
     * back typed as the schema's message shape.
     */
    validate<T>(schemaId: string, data: unknown): ValidationResult<T> {
        if (!this.schemasLoaded) {
            logger.warn('Schemas not loaded, validation will fail');
            return { valid: false, errors: 'Schemas not loaded' };
        }

        if (!this.ajv.getSchema(schemaId)) {
            logger.error({ schemaId }, 'Schema not found');
            return { valid: false, errors: `Schema not found: ${schemaId}` };
        }

        if (this.ajv.validate<T>(schemaId, data)) {
            return { valid: true, data };
        }

        return { valid: false, errors: this.ajv.errorsText(this.ajv.errors) };
    }

    validateVitalsRecorded(data: unknown): ValidationResult<VitalsRecordedEvent> {
        return this.validate(SCHEMA_IDS.vitalsRecorded, data);
    }

    validateSosTrigger(data: unknown): ValidationResult<SosTriggerCommand> {
        return this.validate(SCHEMA_IDS.sosTrigger, data);
    }

    validateOtpRequest(data: unknown): ValidationResult<OtpRequestCommand> {
        return this.validate(SCHEMA_IDS.otpRequest, data);
    }

    validateOtpVerify(data: unknown): ValidationResult<OtpVerifyCommand> {
        return this.validate(SCHEMA_IDS.otpVerify, data);
    }

    validateOtpResend(data: unknown): ValidationResult<OtpResendCommand> {
        return this.validate(SCHEMA_IDS.otpResend, data);
    }

    validateThresholdsSimulate(data: unknown): ValidationResult<ThresholdsSimulateCommand> {
        return this.validate(SCHEMA_IDS.thresholdsSimulate, data);
    }

    validateThresholdsCustomSet(data: unknown): ValidationResult<ThresholdsCustomSetCommand> {
        return this.validate(SCHEMA_IDS.thresholdsCustomSet, data);
    }

    validateThresholdsCustomClear(data: unknown): ValidationResult<ThresholdsCustomClearCommand> {
        return this.validate(SCHEMA_IDS.thresholdsCustomClear, data);
    }

    validateAlertResolve(data: unknown): ValidationResult<AlertResolveCommand> {
        return this.validate(SCHEMA_IDS.alertResolve, data);
    }

    validateEmergencyResolve(data: unknown): ValidationResult<EmergencyResolveCommand> {
        return this.validate(SCHEMA_IDS.emergencyResolve, data);
    }

    validateDirectorySeed(data: unknown): ValidationResult<DirectorySeed> {
        return this.validate(SCHEMA_IDS.directorySeed, data);
    }
}
