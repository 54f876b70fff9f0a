import { createApp } from './app.js';
import { config } from './shared/config.js';
import { testSupabaseConnection } from './shared/supabase.js';
import { DATE_RANGE_LABELS } from './utils/dateRange.js';

const PORT = config.server.port;

console.log('🚀 Starting QA eval dashboard service...');
console.log('📊 Configuration:');
console.log(`   Port: ${PORT}`);
console.log(`   Messages Table: ${config.supabase.messagesTable}`);
console.log(`   Evaluations Table: ${config.supabase.evaluationsTable}`);
console.log(`   Default Range: ${DATE_RANGE_LABELS[config.dashboard.defaultRange]}`);
console.log(`   Page Size: ${config.dashboard.pageSize}`);
console.log(`   Faithfulness Threshold: ${config.dashboard.faithfulnessThreshold}`);

// A failed probe is logged but does not stop startup; requests report 503
// until the store is reachable.
console.log('🔍 Testing connections...');
await testSupabaseConnection();

const app = createApp();

app.listen(PORT, '0.0.0.0', () => {
  console.log(`✅ Server running on 0.0.0.0:${PORT}`);
  console.log(`📍 Health check: http://localhost:${PORT}/health`);
  console.log(`📈 Metrics: GET http://localhost:${PORT}/api/metrics?range=30d`);
  console.log(`📅 Daily: GET http://localhost:${PORT}/api/daily?range=30d`);
  console.log(`🧮 Distribution: GET http://localhost:${PORT}/api/distribution?range=30d`);
  console.log(`📋 Messages: GET http://localhost:${PORT}/api/messages?range=30d&page=1`);
  console.log(`🚨 Flagged: GET http://localhost:${PORT}/api/flagged?range=30d&threshold=0.7`);
});

export default app;
