/**
 * Storage environment diagnostics
 *
 * Usage: npm run env:diag
 *
 * Prints which storage settings are loaded and which backends could connect,
 * without touching either store
 */

import {
  STORAGE_ENV_KEYS,
  getEnvDiagnostics,
  initEnv,
  loadCloudConfig,
  loadSelfHostedConfig,
  readConnectionTargetSetting,
} from '@bucketbridge/config';

// Initialize env first
const { envFilePath, envLocalFilePath, loaded, localLoaded, keysLoaded } = initEnv();

console.log('🔍 Storage Environment Diagnostics');
console.log(`   .env file: ${envFilePath}`);
console.log(`   .env exists: ${loaded ? '✅' : '❌'}`);
console.log(`   .env.local file: ${envLocalFilePath}`);
console.log(`   .env.local exists: ${localLoaded ? '✅' : '❌'}`);
console.log(`   Keys loaded: ${keysLoaded.length}`);

const diagnostics = getEnvDiagnostics(STORAGE_ENV_KEYS);

console.log('\n📋 Storage Variables:');
for (const key of diagnostics.keys) {
  const status = key.present ? '✅' : '➖';
  const masked = key.maskedValue ? ` (${key.maskedValue})` : '';
  const source = key.source ? ` [from ${key.source}]` : '';
  console.log(`   ${status} ${key.key}${masked}${source}`);
}

const selfHosted = loadSelfHostedConfig();
const cloud = loadCloudConfig();
const target = readConnectionTargetSetting();

console.log('\n🪣 Backends:');
console.log(`   Connection target: ${target ?? '(unset, self-hosted)'}`);
console.log(`   Self-hosted: ${selfHosted.ok ? `✅ ${selfHosted.config.endpoint}` : `❌ missing ${selfHosted.missing.join(', ')}`}`);
console.log(`   Cloud: ${cloud.ok ? `✅ ${cloud.config.endpoint}` : `❌ missing ${cloud.missing.join(', ')}`}`);

// Structured JSON output (for machine parsing)
const structuredOutput = {
  event: 'env.diagnostics',
  envFilePath,
  envFileExists: loaded,
  envLocalFileExists: localLoaded,
  connectionTarget: target ?? null,
  selfHostedReady: selfHosted.ok,
  cloudReady: cloud.ok,
  variables: diagnostics.keys,
  warnings: diagnostics.warnings,
};

console.log('\n📊 Structured Output (JSON):');
console.log(JSON.stringify(structuredOutput, null, 2));

if (diagnostics.warnings.length > 0) {
  console.log('\n⚠️  Warnings:');
  for (const warning of diagnostics.warnings) {
    console.log(`   - ${warning}`);
  }
}
