import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { loadCredentialSource } from './source';
import { CredentialsError } from '../utils/errors';

describe('loadCredentialSource', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'credentials-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function writeCredentials(content: string): Promise<string> {
    const file = path.join(tempDir, '.env');
    await fs.writeFile(file, content, 'utf-8');
    return file;
  }

  it('should read both keys from the file', async () => {
    const file = await writeCredentials('PAN=12345678\nPASSWORD="test secret"\n');

    await expect(loadCredentialSource(file, {})).resolves.toEqual({
      pan: '12345678',
      password: 'test secret',
    });
  });

  it('should prefer the file over the environment', async () => {
    const file = await writeCredentials('PAN=11111111\n');

    await expect(
      loadCredentialSource(file, { PAN: '22222222', PASSWORD: 'test-secret' })
    ).resolves.toEqual({ pan: '11111111', password: 'test-secret' });
  });

  it('should treat a missing file as empty', async () => {
    await expect(loadCredentialSource(path.join(tempDir, 'absent.env'), {})).resolves.toEqual({
      pan: undefined,
      password: undefined,
    });
  });

  it('should ignore blank values', async () => {
    const file = await writeCredentials('PAN=\nPASSWORD="   "\n');

    await expect(loadCredentialSource(file, {})).resolves.toEqual({
      pan: undefined,
      password: undefined,
    });
  });

  it('should fail on an unreadable file', async () => {
    await expect(loadCredentialSource(tempDir, {})).rejects.toBeInstanceOf(CredentialsError);
  });
});
