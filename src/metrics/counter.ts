function emptyCounters() {
    return {
        readings_received: 0,
        readings_processed: 0,
        dropped_invalid: 0,
        processing_failed: 0,
        vital_evaluation_failed: 0,
        alerts_created: 0,
        notifications_sent: 0,
        notifications_failed: 0,
        emergencies_created: 0,
        otp_issued: 0,
        otp_verified: 0,
        otp_rejected: 0,
        commands_handled: 0,
        commands_failed: 0,
    };
}

export type Counters = ReturnType<typeof emptyCounters>;

export type CounterName = keyof Counters;

export class Metrics {
    private counters: Counters = emptyCounters();

    increment(name: CounterName, by = 1): void {
        this.counters[name] += by;
    }

    getCounters(): Counters {
        return { ...this.counters };
    }

    reset(): void {
        this.counters = emptyCounters();
    }
}
