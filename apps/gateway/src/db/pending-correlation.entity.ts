/** A workflow instance waiting for a callback with this correlation key. */
export type PendingCorrelationEntity = {
    correlation_key: string;
    source: string;
    process_instance_id: string | null;
    business_key: string | null;
    message_name: string | null;
    created_at: Date;
};
