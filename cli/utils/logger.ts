/**
 * CLI Logger Utility
 */

export const logger = {
  info: (msg: string) => console.log(`ℹ️  ${msg}`),
  success: (msg: string) => console.log(`✅ ${msg}`),
  warn: (msg: string) => console.log(`⚠️  ${msg}`),
  error: (msg: string) => console.error(`❌ ${msg}`),
  debug: (msg: string) => {
    if (process.env.DEBUG) {
      console.log(`🐛 ${msg}`);
    }
  },

  section: (title: string) => {
    console.log(`\n${'='.repeat(60)}`);
    console.log(`  ${title}`);
    console.log(`${'='.repeat(60)}\n`);
  },

  table: (data: Record<string, unknown>[]) => {
    if (data.length === 0) {
      console.log('  (no data)');
      return;
    }
    console.table(data);
  },

  json: (data: unknown) => {
    console.log(JSON.stringify(data, null, 2));
  }
};
