import type { Msg, Subscription } from 'nats';
import { logger } from '../config/logger.js';
import { SchemaValidator, type ValidationResult } from '../contracts/schema-validator.js';
import { parseSeverity, parseThresholdCategory } from '../domain/enums.js';
import { NotFoundError, ValidationError, errorMessage } from '../domain/errors.js';
import type { ThresholdBand } from '../domain/types.js';
import { EmergencyEscalator } from '../emergency/escalator.js';
import { SosService } from '../emergency/sos.js';
import { Metrics } from '../metrics/counter.js';
import { OtpService } from '../otp/service.js';
import { IngestionPipeline } from '../pipeline/ingestion.js';
import type { DirectoryStore } from '../storage/store.js';
import { ThresholdProvisioner } from '../thresholds/provisioner.js';
import { ThresholdResolver } from '../thresholds/resolver.js';
import { simulateThresholds } from '../thresholds/simulator.js';
import { NatsClient } from './connection.js';

export const COMMAND_SUBJECTS = {
    sosTrigger: 'sos.trigger',
    otpRequest: 'auth.otp.request',
    otpVerify: 'auth.otp.verify',
    otpResend: 'auth.otp.resend',
    thresholdsSimulate: 'thresholds.simulate',
    thresholdsCustomSet: 'thresholds.custom.set',
    thresholdsCustomClear: 'thresholds.custom.clear',
    alertResolve: 'alerts.resolve',
    emergencyResolve: 'emergencies.resolve',
} as const;

export interface CommandServices {
    sos: SosService;
    otp: OtpService;
    pipeline: Pick<IngestionPipeline, 'resolveAlert'>;
    escalator: Pick<EmergencyEscalator, 'resolve'>;
    provisioner: ThresholdProvisioner;
    resolver: ThresholdResolver;
    directory: Pick<DirectoryStore, 'getUser'>;
}

export type ReplyErrorCode = 'bad_request' | 'not_found' | 'unknown_subject' | 'internal_error';

export type CommandReply =
    | { ok: true; result: Record<string, unknown> }
    | { ok: false; error: { code: ReplyErrorCode; message: string } };

function failure(code: ReplyErrorCode, message: string): CommandReply {
    return { ok: false, error: { code, message } };
}

function toBandReply(band: ThresholdBand): Record<string, unknown> {
    return {
        vital_kind: band.vitalKind,
        low: band.low ?? null,
        high: band.high ?? null,
        category: band.category,
    };
}

function unwrap<T>(validation: ValidationResult<T>): T {
    if (!validation.valid) {
        throw new ValidationError(validation.errors);
    }
    return validation.data;
}

/**
 * Serves the request-reply command subjects. Every request gets exactly one
 * JSON reply, errors included.
 */
export class CommandResponder {
    private subscriptions: Subscription[] = [];

    constructor(
        private natsClient: NatsClient,
        private validator: SchemaValidator,
        private services: CommandServices,
        private metrics: Metrics,
    ) { }

    start(): void {
        const nc = this.natsClient.getConnection();

        for (const subject of Object.values(COMMAND_SUBJECTS)) {
            const subscription = nc.subscribe(subject);
            this.subscriptions.push(subscription);
            this.serve(subject, subscription).catch((err) => {
                logger.error({ subject, error: errorMessage(err) }, 'Command subscription stopped');
            });
            logger.info({ subject }, 'Listening for commands');
        }
    }

    async stop(): Promise<void> {
        await Promise.all(this.subscriptions.map((subscription) => subscription.drain()));
        this.subscriptions = [];
    }

    async handle(subject: string, payload: unknown): Promise<CommandReply> {
        try {
            const result = await this.dispatch(subject, payload);
            if (!result) {
                this.metrics.increment('commands_failed');
                return failure('unknown_subject', `No handler for ${subject}`);
            }
            this.metrics.increment('commands_handled');
            return { ok: true, result };
        } catch (err) {
            this.metrics.increment('commands_failed');
            if (err instanceof ValidationError) {
                return failure('bad_request', err.message);
            }
            if (err instanceof NotFoundError) {
                return failure('not_found', err.message);
            }
            logger.error({ subject, error: errorMessage(err) }, 'Command failed');
            return failure('internal_error', 'Internal error');
        }
    }

    private async serve(subject: string, subscription: Subscription): Promise<void> {
        for await (const msg of subscription) {
            msg.respond(JSON.stringify(await this.reply(subject, msg)));
        }
    }

    private async reply(subject: string, msg: Msg): Promise<CommandReply> {
        let payload: unknown;
        try {
            payload = msg.json<unknown>();
        } catch (err) {
            this.metrics.increment('commands_failed');
            logger.warn({ subject, error: errorMessage(err) }, 'Command body is not JSON');
            return failure('bad_request', 'Body must be JSON');
        }
        return this.handle(subject, payload);
    }

    private async requireUser(userId: string): Promise<void> {
        if (!(await this.services.directory.getUser(userId))) {
            throw new NotFoundError('User', userId);
        }
    }

    private async dispatch(subject: string, payload: unknown): Promise<Record<string, unknown> | undefined> {
        switch (subject) {
            case COMMAND_SUBJECTS.sosTrigger: {
                const command = unwrap(this.validator.validateSosTrigger(payload));
                const outcome = await this.services.sos.triggerSos({
                    userId: command.user_id,
                    deviceId: command.device_id ?? null,
                    severity: command.severity === undefined ? undefined : parseSeverity(command.severity),
                    latitude: command.latitude ?? null,
                    longitude: command.longitude ?? null,
                });
                return {
                    alert_id: outcome.alert.id,
                    emergency_id: outcome.emergency?.id ?? null,
                    notifications: outcome.notifications.map((n) => ({
                        channel: n.channel,
                        recipient: n.recipient,
                        status: n.status,
                    })),
                };
            }

            case COMMAND_SUBJECTS.otpRequest: {
                const command = unwrap(this.validator.validateOtpRequest(payload));
                const result = await this.services.otp.requestOtp(command.user_id, {
                    ipAddress: command.ip_address ?? null,
                    userAgent: command.user_agent ?? null,
                });
                return {
                    sent: result.sent,
                    challenge_id: result.challengeId,
                    expires_at: result.expiresAt,
                };
            }

            case COMMAND_SUBJECTS.otpVerify: {
                const command = unwrap(this.validator.validateOtpVerify(payload));
                const outcome = await this.services.otp.verifyOtp(command.user_id, command.code);
                return {
                    verified: outcome.status === 'verified',
                    status: outcome.status,
                    ...(outcome.status === 'invalid_code' ? { attempts_left: outcome.attemptsLeft } : {}),
                };
            }

            case COMMAND_SUBJECTS.otpResend: {
                const command = unwrap(this.validator.validateOtpResend(payload));
                const response = await this.services.otp.resendOtp(command.email, {
                    ipAddress: command.ip_address ?? null,
                    userAgent: command.user_agent ?? null,
                });
                return { message: response.message, otp_sent: response.otpSent };
            }

            case COMMAND_SUBJECTS.thresholdsSimulate: {
                const command = unwrap(this.validator.validateThresholdsSimulate(payload));
                await this.requireUser(command.user_id);
                const breaches = await simulateThresholds(this.services.resolver, command.user_id, command.vitals);
                return {
                    breaches: breaches.map((b) => ({ vital_kind: b.vitalKind, value: b.value, severity: b.severity })),
                };
            }

            case COMMAND_SUBJECTS.thresholdsCustomSet: {
                const command = unwrap(this.validator.validateThresholdsCustomSet(payload));
                await this.requireUser(command.user_id);
                const bands = await this.services.provisioner.setCustomThresholds(command.user_id, command.thresholds);
                return { bands: bands.map(toBandReply) };
            }

            case COMMAND_SUBJECTS.thresholdsCustomClear: {
                const command = unwrap(this.validator.validateThresholdsCustomClear(payload));
                await this.requireUser(command.user_id);
                const category = command.category === undefined ? undefined : parseThresholdCategory(command.category);
                const bands = await this.services.provisioner.clearCustomThresholds(command.user_id, category);
                return { bands: bands.map(toBandReply) };
            }

            case COMMAND_SUBJECTS.alertResolve: {
                const command = unwrap(this.validator.validateAlertResolve(payload));
                const alert = await this.services.pipeline.resolveAlert(command.alert_id);
                return { alert_id: alert.id, resolved: alert.resolved };
            }

            case COMMAND_SUBJECTS.emergencyResolve: {
                const command = unwrap(this.validator.validateEmergencyResolve(payload));
                const emergency = await this.services.escalator.resolve(command.emergency_id);
                return { emergency_id: emergency.id, resolved: emergency.resolved };
            }

            default:
                return undefined;
        }
    }
}
