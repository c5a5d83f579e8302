import { logger } from '../config/logger.js';
import { NotFoundError, errorMessage } from '../domain/errors.js';
import type { User } from '../domain/types.js';
import { withTimeout, type MailSender } from '../notifications/senders.js';
import type { DirectoryStore } from '../storage/store.js';
import { EMAIL_VERIFICATION, OtpEngine, type IssueMetadata, type ResendOutcome, type VerifyOutcome } from './engine.js';

export const RESEND_MESSAGE = 'Verification code resent if account exists.';

export interface OtpServiceOptions {
    ttlMinutes: number;
    timeoutMs: number;
}

export interface OtpRequestResult {
    sent: boolean;
    challengeId: string;
    expiresAt: string;
    sendError?: string;
}

export interface ResendResponse {
    message: string;
    otpSent: boolean;
}

export function verificationEmail(code: string, ttlMinutes: number): { subject: string; body: string } {
    return {
        subject: 'Your verification code',
        body: [
            `Your verification code is ${code}.`,
            `It expires in ${ttlMinutes} minutes.`,
            'If you did not request this code you can ignore this email.',
        ].join('\n'),
    };
}

/**
 * Account-facing OTP flow: issues codes, mails them, and keeps every response
 * free of hints about whether an account exists.
 */
export class OtpService {
    constructor(
        private engine: OtpEngine,
        private store: Pick<DirectoryStore, 'getUser' | 'findUserByEmail'>,
        private mailer: MailSender,
        private options: OtpServiceOptions,
    ) { }

    async requestOtp(userId: string, meta: IssueMetadata = {}): Promise<OtpRequestResult> {
        const user = await this.store.getUser(userId);
        if (!user) {
            throw new NotFoundError('User', userId);
        }

        const { challenge, code } = await this.engine.issue(user.id, EMAIL_VERIFICATION, meta);
        const delivery = await this.mailCode(user, code);

        return {
            sent: delivery.sent,
            challengeId: challenge.id,
            expiresAt: challenge.expiresAt,
            ...(delivery.error ? { sendError: delivery.error } : {}),
        };
    }

    async resendOtp(email: string, meta: IssueMetadata = {}): Promise<ResendResponse> {
        const user = await this.store.findUserByEmail(email);
        if (!user) {
            return { message: RESEND_MESSAGE, otpSent: false };
        }

        let outcome: ResendOutcome;
        try {
            outcome = await this.engine.resend(user.id, EMAIL_VERIFICATION, meta);
        } catch (err) {
            logger.error({ userId: user.id, error: errorMessage(err) }, 'Failed to reissue verification code');
            return { message: RESEND_MESSAGE, otpSent: false };
        }
        if (outcome.status === 'rate_limited') {
            return { message: RESEND_MESSAGE, otpSent: false };
        }

        const delivery = await this.mailCode(user, outcome.code);
        return { message: RESEND_MESSAGE, otpSent: delivery.sent };
    }

    async verifyOtp(userId: string, code: string): Promise<VerifyOutcome> {
        const user = await this.store.getUser(userId);
        if (!user) {
            // Same hashing work as a real attempt
            this.engine.hashCode(code);
            return { status: 'no_valid_code' };
        }
        return this.engine.verify(user.id, EMAIL_VERIFICATION, code);
    }

    private async mailCode(user: User, code: string): Promise<{ sent: boolean; error?: string }> {
        const { subject, body } = verificationEmail(code, this.options.ttlMinutes);
        try {
            const sent = await withTimeout(
                this.mailer.send(user.email, subject, body),
                this.options.timeoutMs,
                'verification email',
            );
            if (!sent) {
                logger.warn({ userId: user.id }, 'Verification email rejected');
                return { sent: false, error: 'send_failed' };
            }
            logger.info({ userId: user.id }, 'Verification email sent');
            return { sent: true };
        } catch (err) {
            logger.error({ userId: user.id, error: errorMessage(err) }, 'Failed to send verification email');
            return { sent: false, error: errorMessage(err) };
        }
    }
}
