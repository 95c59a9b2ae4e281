import { promises as fs } from 'fs';
import path from 'path';
import type { ImapConnectionSettings } from '../../config';
import { main as convertMain } from '../../scripts/convertMbox';
import { main as uploadMain, parseArgs } from '../../scripts/uploadEml';
import { FakeMailboxSession } from '../fixtures/FakeMailboxSession';
import { createTestEmail, createTestMbox, makeTempDir, writeTestMbox } from '../fixtures/createTestMbox';

describe('uploadEml CLI', () => {
  let tempDir: string;
  let exportDir: string;
  let ledgerPath: string;
  let session: FakeMailboxSession;
  let connections: ImapConnectionSettings[];

  const dependencies = () => ({
    createSession: (connection: ImapConnectionSettings) => {
      connections.push(connection);
      return session;
    },
    signal: new AbortController().signal,
    sleep: async () => undefined,
  });

  const gmailOptions = () => ({
    provider: 'gmail',
    email: 'user@example.com',
    password: 'test-secret',
    directory: exportDir,
    ledger: ledgerPath,
  });

  beforeEach(async () => {
    tempDir = await makeTempDir('upload-cli-');
    exportDir = path.join(tempDir, 'export');
    ledgerPath = path.join(tempDir, 'state', 'ledger.jsonl');
    session = new FakeMailboxSession();
    connections = [];
    process.env.IMPORT_ROOT_FOLDER = 'ARCH-IMPORT';
  });

  afterEach(async () => {
    delete process.env.IMPORT_ROOT_FOLDER;
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  const convertArchive = async () => {
    const mboxPath = await writeTestMbox(
      tempDir,
      createTestMbox([
        createTestEmail({ labels: ['Work'], messageId: '<a@example.com>', body: 'a' }),
        createTestEmail({ labels: ['Family', 'Unread'], messageId: '<b@example.com>', body: 'b' }),
      ])
    );
    await convertMain({ mboxPath, output: exportDir });
  };

  it('parses connection flags', () => {
    expect(
      parseArgs([
        '--imap-provider', 'custom',
        '--directory', 'out',
        '--server', 'imap.test',
        '--port', '1143',
        '--username', 'user',
        '--password', 'test-secret',
        '--resume',
        '--insecure',
        '--allow-self-signed',
        '--ledger', 'ledger.jsonl',
      ])
    ).toEqual({
      provider: 'custom',
      directory: 'out',
      server: 'imap.test',
      port: '1143',
      username: 'user',
      password: 'test-secret',
      resume: true,
      insecure: true,
      allowSelfSigned: true,
      ledger: 'ledger.jsonl',
    });
  });

  it('requires a directory', async () => {
    await expect(uploadMain({ provider: 'gmail' }, dependencies())).rejects.toMatchObject({
      code: 'CONFIG_004',
    });
  });

  it('lists every missing custom server option', async () => {
    await expect(
      uploadMain({ provider: 'custom', password: 'test-secret', directory: tempDir }, dependencies())
    ).rejects.toMatchObject({
      code: 'CONFIG_003',
      issues: [
        { field: 'server', message: '--server is required for custom provider' },
        { field: 'port', message: '--port is required for custom provider' },
        { field: 'username', message: '--username is required for custom provider' },
      ],
    });
  });

  it('rejects a directory that does not exist', async () => {
    await expect(uploadMain(gmailOptions(), dependencies())).rejects.toMatchObject({
      code: 'FILE_002',
    });
  });

  it('uploads a converted export and skips it on resume', async () => {
    await convertArchive();

    const report = await uploadMain(gmailOptions(), dependencies());

    expect(connections[0]).toMatchObject({
      provider: 'gmail',
      host: 'imap.gmail.com',
      port: 993,
      secure: true,
      user: 'user@example.com',
    });
    expect(report).toEqual({
      total: 2,
      skipped: 0,
      uploaded: 2,
      failed: 0,
      foldersCreated: 3,
      interrupted: false,
    });
    expect(session.calls).toEqual([
      'create ARCH-IMPORT',
      'create ARCH-IMPORT/Family',
      'select ARCH-IMPORT/Family',
      'append ARCH-IMPORT/Family',
      'create ARCH-IMPORT/Work',
      'select ARCH-IMPORT/Work',
      'append ARCH-IMPORT/Work',
    ]);

    session = new FakeMailboxSession();
    const resumed = await uploadMain({ ...gmailOptions(), resume: true }, dependencies());

    expect(resumed).toMatchObject({ total: 2, skipped: 2, uploaded: 0 });
    expect(session.appended).toHaveLength(0);
    expect((await fs.readFile(ledgerPath, 'utf-8')).trim().split('\n')).toHaveLength(2);
  });

  it('releases the ledger when the run fails', async () => {
    await convertArchive();
    session.connectFailures = [new Error('unexpected greeting')];

    await expect(uploadMain(gmailOptions(), dependencies())).rejects.toMatchObject({
      code: 'IMAP_002',
    });
    await expect(fs.access(`${ledgerPath}.lock`)).rejects.toThrow();
  });
});
