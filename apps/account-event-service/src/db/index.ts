/**
 * Database module exports
 */

export { getSupabase, isSupabaseConfigured } from "./supabase";
export { SupabaseEventPublisher, supabaseQueueTransport } from "./eventQueue";
export type { EventPublisher, QueueTransport, QueueSendError } from "./eventQueue";
