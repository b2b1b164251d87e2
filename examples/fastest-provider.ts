import { FastestRpcSelector } from '../src';

async function main() {
  const providers = (process.env.RPC_URLS || 'https://rpc.gnosischain.com,https://gnosis.drpc.org')
    .split(',')
    .map((u) => u.trim())
    .filter(Boolean);

  const selector = FastestRpcSelector.init(providers, 10_000, {
    settings: { logLevel: 'info', chainId: 100 },
  });

  console.log(`Measuring ${providers.length} providers...`);
  await selector.waitUntilReady();

  const entries = Object.entries(selector.getLatencies()).sort((a, b) => a[1] - b[1]);
  console.log('\nLatency results (ms):');
  for (const [url, ms] of entries) {
    console.log(`  ${url} -> ${ms.toFixed(2)}`);
  }

  try {
    const provider = selector.getFastestRpcProvider();
    console.log(`\nFastest provider: ${provider.connection.url}`);
    const latestBlock = await provider.getBlockNumber();
    console.log(`Latest block: ${latestBlock}`);
  } catch (e) {
    console.error('No provider answered the first round', e);
  } finally {
    selector.destroy();
  }
}

main().catch(err => {
  console.error('Script failed', err);
  process.exit(1);
});
