import { loadEnv } from '../src/config/env.js';
import { completionConfigFromEnv, createCompletionClient } from '../src/services/completionClient.js';
import { normalizeExtraction } from '../src/services/fieldNormalizer.js';
import { JobAnalyzer } from '../src/services/jobAnalyzer.js';

const SAMPLE_POST = {
  id: 1,
  time: Math.floor(Date.now() / 1000),
  text: 'Acme Robotics | Senior Backend Engineer | REMOTE (US only) | $120k-$150k<p>'
    + 'We build warehouse robots with Python, Django and PostgreSQL on AWS. Visa sponsorship available.',
};

function maskKey(key: string | null): string {
  if (!key) {
    return 'not required';
  }

  return `****${key.slice(-4)}`;
}

function fail(reason: string): never {
  console.error(`[SmokeTest] ❌ FAILED: ${reason}`);
  process.exit(1);
}

async function main(): Promise<void> {
  const env = loadEnv();
  const config = completionConfigFromEnv(env);
  console.info('[SmokeTest] Resolved LLM configuration:');
  console.info(`  Provider : ${config.provider}`);
  console.info(`  Model    : ${config.modelName}`);
  console.info(`  Base URL : ${config.baseUrl}`);
  console.info(`  API Key  : ${maskKey(config.apiKey)}`);

  const analyzer = new JobAnalyzer(createCompletionClient(env), {
    maxChars: env.EXTRACT_MAX_CHARS,
    temperature: env.LLM_TEMPERATURE,
  });
  const result = normalizeExtraction(await analyzer.analyze(SAMPLE_POST.text), SAMPLE_POST);

  console.info('[SmokeTest] Extraction result:');
  console.log(JSON.stringify(result, null, 2));

  if (result.remote_type !== 'US_ONLY') {
    fail(`remote_type is ${result.remote_type}, expected US_ONLY.`);
  }

  if (result.tech_stack.length === 0) {
    fail('tech_stack is empty.');
  }

  console.info(`[SmokeTest] ✅ PASSED — ${result.company ?? 'unknown company'}, ${result.job_role}`);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`[SmokeTest] ❌ FAILED: ${message}`);
  process.exit(1);
});
