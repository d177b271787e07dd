import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { ErrorCodes, ErrorSeverity, IntakeError } from "../../utils/error";

export interface SupabaseCredentials {
  supabaseUrl?: string;
  supabaseKey?: string;
}

export function createSupabaseClient({
  supabaseUrl,
  supabaseKey,
}: SupabaseCredentials): SupabaseClient {
  if (!supabaseUrl || !supabaseKey) {
    throw new IntakeError(
      "Missing Supabase credentials in configuration",
      ErrorCodes.INVALID_CONFIGURATION,
      ErrorSeverity.CRITICAL,
      { component: "supabase" }
    );
  }

  // Service key: the intake pipeline writes on behalf of users
  return createClient(supabaseUrl, supabaseKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });
}
