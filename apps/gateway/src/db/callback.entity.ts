import { Document } from '@taskgate/sdk';

/**
 * A push notification received from an external system (row of gateway_callbacks).
 * Kept forever as an audit trail. Terminal once signal_sent or expired_at is set.
 */
export type CallbackEntity = {
    id: string;
    source: string;
    correlation_key: string;
    payload_hash: string;
    raw_payload: Document;
    received_at: Date;
    processed: boolean;
    signal_sent: boolean;
    attempts: number;
    last_error: string | null;
    processed_at: Date | null;
    signalled_at: Date | null;
    expired_at: Date | null;
};
