import { createHmac, randomInt, timingSafeEqual } from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../config/logger.js';
import type { OtpChallenge } from '../domain/types.js';
import { Metrics } from '../metrics/counter.js';
import type { DirectoryStore, OtpStore } from '../storage/store.js';
import { KeyedLock } from './keyed-lock.js';

export const EMAIL_VERIFICATION = 'email_verification';

export interface OtpConfig {
    length: number;
    ttlMinutes: number;
    maxAttempts: number;
    resendCooldownSeconds: number;
    hashSecret: string;
}

export interface IssueMetadata {
    sentVia?: string;
    ipAddress?: string | null;
    userAgent?: string | null;
}

export interface IssuedChallenge {
    challenge: OtpChallenge;
    /** Plaintext code. Exists only here, for out-of-band delivery. */
    code: string;
}

export type VerifyOutcome =
    | { status: 'verified' }
    | { status: 'invalid_code'; attemptsLeft: number }
    | { status: 'max_attempts_exceeded' }
    | { status: 'no_valid_code' };

export type ResendOutcome =
    | ({ status: 'issued' } & IssuedChallenge)
    | { status: 'rate_limited'; retryAfterSeconds: number };

type EngineStore = OtpStore & Pick<DirectoryStore, 'markUserVerified'>;

const DEFAULT_LENGTH = 6;
// randomInt requires max - min < 2^48
const MAX_LENGTH = 14;

export class OtpEngine {
    private lock = new KeyedLock();

    constructor(
        private store: EngineStore,
        private config: OtpConfig,
        private metrics: Metrics,
        private now: () => Date = () => new Date(),
    ) { }

    generateCode(): string {
        const length =
            this.config.length > 0 && this.config.length <= MAX_LENGTH ? this.config.length : DEFAULT_LENGTH;
        return randomInt(0, 10 ** length).toString().padStart(length, '0');
    }

    /** HMAC-SHA256 of the code, hex encoded. */
    hashCode(code: string): string {
        return createHmac('sha256', this.config.hashSecret).update(code, 'utf8').digest('hex');
    }

    /**
     * Invalidate every outstanding challenge for (user, purpose) and issue a new one.
     */
    async issue(userId: string, purpose = EMAIL_VERIFICATION, meta: IssueMetadata = {}): Promise<IssuedChallenge> {
        return this.lock.run(lockKey(userId, purpose), () => this.issueLocked(userId, purpose, meta));
    }

    async verify(userId: string, purpose: string, code: string): Promise<VerifyOutcome> {
        return this.lock.run(lockKey(userId, purpose), async () => {
            const provided = this.hashCode(code.trim());
            const challenge = await this.store.findLatestValidChallenge(userId, purpose, this.now());

            if (!challenge) {
                this.metrics.increment('otp_rejected');
                return { status: 'no_valid_code' };
            }

            if (challenge.attempts >= this.config.maxAttempts) {
                await this.store.updateChallenge({ ...challenge, used: true });
                this.metrics.increment('otp_rejected');
                logger.warn({ userId, purpose, challengeId: challenge.id }, 'OTP attempts exhausted');
                return { status: 'max_attempts_exceeded' };
            }

            if (!hashesEqual(provided, challenge.codeHash)) {
                const attempts = challenge.attempts + 1;
                await this.store.updateChallenge({ ...challenge, attempts });
                this.metrics.increment('otp_rejected');
                logger.info({ userId, purpose, attempts }, 'OTP mismatch');
                return { status: 'invalid_code', attemptsLeft: Math.max(0, this.config.maxAttempts - attempts) };
            }

            await this.store.updateChallenge({ ...challenge, used: true });
            await this.store.markUserVerified(userId);
            this.metrics.increment('otp_verified');
            logger.info({ userId, purpose, challengeId: challenge.id }, 'OTP verified');
            return { status: 'verified' };
        });
    }

    async canResend(userId: string, purpose = EMAIL_VERIFICATION): Promise<boolean> {
        return (await this.cooldownRemainingMs(userId, purpose)) === 0;
    }

    /**
     * Issue a replacement code unless the last one is younger than the cooldown.
     */
    async resend(userId: string, purpose = EMAIL_VERIFICATION, meta: IssueMetadata = {}): Promise<ResendOutcome> {
        return this.lock.run(lockKey(userId, purpose), async () => {
            const remainingMs = await this.cooldownRemainingMs(userId, purpose);
            if (remainingMs > 0) {
                logger.info({ userId, purpose }, 'OTP resend rate limited');
                return { status: 'rate_limited', retryAfterSeconds: Math.ceil(remainingMs / 1000) };
            }
            const issued = await this.issueLocked(userId, purpose, meta);
            return { status: 'issued', ...issued };
        });
    }

    private async cooldownRemainingMs(userId: string, purpose: string): Promise<number> {
        const last = await this.store.findLatestChallenge(userId, purpose);
        if (!last) {
            return 0;
        }
        const elapsed = this.now().getTime() - Date.parse(last.createdAt);
        return Math.max(0, this.config.resendCooldownSeconds * 1000 - elapsed);
    }

    private async issueLocked(userId: string, purpose: string, meta: IssueMetadata): Promise<IssuedChallenge> {
        const code = this.generateCode();
        const createdAt = this.now();
        const expiresAt = new Date(createdAt.getTime() + this.config.ttlMinutes * 60_000);

        const challenge: OtpChallenge = {
            id: uuidv4(),
            userId,
            purpose,
            codeHash: this.hashCode(code),
            createdAt: createdAt.toISOString(),
            expiresAt: expiresAt.toISOString(),
            used: false,
            attempts: 0,
            sentVia: meta.sentVia ?? 'email',
            ipAddress: meta.ipAddress ?? null,
            userAgent: meta.userAgent ?? null,
        };

        const invalidated = await this.store.replaceActiveChallenge(challenge, createdAt);
        this.metrics.increment('otp_issued');
        logger.info(
            { userId, purpose, challengeId: challenge.id, invalidated, expiresAt: challenge.expiresAt },
            'OTP issued',
        );

        return { challenge, code };
    }
}

function lockKey(userId: string, purpose: string): string {
    return `${userId}:${purpose}`;
}

function hashesEqual(a: string, b: string): boolean {
    const left = Buffer.from(a, 'hex');
    const right = Buffer.from(b, 'hex');
    if (left.length !== right.length) {
        return false;
    }
    return timingSafeEqual(left, right);
}
