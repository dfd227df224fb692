import {
  BASECAMP_CONFIG_FIELDS,
  parseBasecampConfig,
  validateBasecampConfig,
} from '../BasecampConfig.js';
import { InvalidConfigurationError, MalformedRecordError, RemoteHttpError } from '../../../types/errors.js';
import { FAKE_API_BASE, FAKE_BASECAMP_URL, FakeBasecamp } from '../../../test/fakeBasecamp.js';

const rawConfig = { url: FAKE_BASECAMP_URL, username: 'jane', password: 'test-password' };

describe('parseBasecampConfig', () => {
  it('returns the trimmed configuration', () => {
    expect(parseBasecampConfig({ ...rawConfig, url: `  ${FAKE_BASECAMP_URL} ` })).toEqual(rawConfig);
  });

  it('names every missing or invalid field', () => {
    const error = (() => {
      try {
        parseBasecampConfig({ url: 'not a url', username: '' });
        return undefined;
      } catch (e) {
        return e;
      }
    })();

    expect(error).toBeInstanceOf(InvalidConfigurationError);
    expect(error).toMatchObject({
      code: 'INVALID_CONFIGURATION',
      context: { fields: ['url', 'username', 'password'] },
    });
  });
});

describe('validateBasecampConfig', () => {
  let fake: FakeBasecamp;

  beforeEach(() => {
    fake = new FakeBasecamp();
  });

  it('probes the project list exactly once and returns the configuration', async () => {
    fake.projects([{ id: 1, name: 'Acme' }]);

    await expect(validateBasecampConfig(rawConfig, { http: { adapter: fake.adapter } })).resolves.toEqual(rawConfig);
    expect(fake.requests).toEqual([
      {
        key: `${FAKE_API_BASE}/projects.json`,
        userAgent: 'BasecampConnector (jane)',
        auth: { username: 'jane', password: 'test-password' },
      },
    ]);
  });

  it('passes the User-Agent application name through', async () => {
    fake.projects([]);

    await validateBasecampConfig(rawConfig, { http: { adapter: fake.adapter }, userAgentApp: 'BasecampConfigApp' });

    expect(fake.requests[0].userAgent).toBe('BasecampConfigApp (jane)');
  });

  it('reports rejected credentials as invalid configuration', async () => {
    fake.projects({ error: 'unauthorized' }, 401);

    const error = await validateBasecampConfig(rawConfig, { http: { adapter: fake.adapter } }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InvalidConfigurationError);
    expect(error).toMatchObject({
      message: 'Basecamp rejected the credentials for jane (HTTP 401)',
      context: { url: FAKE_BASECAMP_URL, status: 401 },
    });
    expect(error instanceof InvalidConfigurationError && error.cause).toBeInstanceOf(RemoteHttpError);
    expect(fake.requests).toHaveLength(1);
  });

  it('reports an unreachable server as invalid configuration', async () => {
    fake.route(`${FAKE_API_BASE}/projects.json`, { networkError: true });

    await expect(validateBasecampConfig(rawConfig, { http: { adapter: fake.adapter } })).rejects.toBeInstanceOf(
      InvalidConfigurationError
    );
  });

  it('reports a server that does not answer with a project list as invalid configuration', async () => {
    fake.projects('<html><body>Sign in</body></html>');

    const error = await validateBasecampConfig(rawConfig, { http: { adapter: fake.adapter } }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InvalidConfigurationError);
    expect(error).toMatchObject({
      message: `${FAKE_BASECAMP_URL} did not answer with a Basecamp project list`,
      context: { url: FAKE_BASECAMP_URL },
    });
    expect(error instanceof InvalidConfigurationError && error.cause).toBeInstanceOf(MalformedRecordError);
  });

  it('rejects malformed input before making any request', async () => {
    await expect(
      validateBasecampConfig({ url: FAKE_BASECAMP_URL, username: 'jane' }, { http: { adapter: fake.adapter } })
    ).rejects.toBeInstanceOf(InvalidConfigurationError);
    expect(fake.requests).toEqual([]);
  });
});

describe('BASECAMP_CONFIG_FIELDS', () => {
  it('masks the password field', () => {
    expect(BASECAMP_CONFIG_FIELDS.map((field) => [field.name, field.inputType])).toEqual([
      ['url', 'text'],
      ['username', 'text'],
      ['password', 'password'],
    ]);
  });
});
