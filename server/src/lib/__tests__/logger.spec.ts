import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { createProviderEventLogger } from '../logger';
import { captureLogger, sleep } from '../../../tests/helpers/stubs';

describe('createProviderEventLogger', () => {
  it('derives a component child logger when no file is configured', () => {
    const { logger, lines } = captureLogger('info');
    const events = createProviderEventLogger(logger);

    events.info({ event: 'request', provider: 'weatherapi' }, 'Weather API request started');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      component: 'weather-providers',
      event: 'request',
      provider: 'weatherapi',
      msg: 'Weather API request started',
    });
  });

  it('appends events to the configured file', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'provider-events-'));
    const file = join(dir, 'nested', 'providers.log');
    const { logger } = captureLogger('info');
    const events = createProviderEventLogger(logger, file);

    events.info({ event: 'chain_start', city: 'Oslo' }, 'Weather provider chain started');
    await sleep(200);

    try {
      const [first] = readFileSync(file, 'utf8').trim().split('\n');
      expect(JSON.parse(first ?? '{}')).toMatchObject({
        component: 'weather-providers',
        event: 'chain_start',
        city: 'Oslo',
      });
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
