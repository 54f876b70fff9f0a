import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import WebSocket from 'ws';
import { config } from './config.js';
import { errorMessage } from './errors.js';

let client: SupabaseClient | null = null;

// Read-only service client, built on first use; no user session involved.
// Node 20 has no global WebSocket, so the realtime transport is supplied.
export function getSupabase(): SupabaseClient {
  if (!client) {
    client = createClient(config.supabase.url, config.supabase.serviceRoleKey, {
      auth: {
        autoRefreshToken: false,
        persistSession: false,
      },
      realtime: {
        transport: WebSocket,
      },
    });
  }

  return client;
}

// Test Supabase connection against both record tables
export async function testSupabaseConnection(
  supabase: SupabaseClient = getSupabase()
): Promise<boolean> {
  const tables = [config.supabase.messagesTable, config.supabase.evaluationsTable];

  try {
    for (const table of tables) {
      const { error } = await supabase.from(table).select('*').limit(1);

      if (error) {
        console.error(`❌ Supabase connection test failed on "${table}":`, error.message);
        return false;
      }
    }

    console.log('✅ Supabase connection successful');
    return true;
  } catch (error: unknown) {
    console.error('❌ Supabase connection test failed:', errorMessage(error));
    return false;
  }
}
