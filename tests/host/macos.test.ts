import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { MacOSHost, openArgs } from '../../src/host/macos.js';
import { bindBrowser } from '../../src/calls/browser.js';
import { ExternalOpenError } from '../../src/utils/errors.js';
import { makeTempDir } from '../helpers.js';

const CALL_URL = 'https://voice.google.com/calls?a=nc,%2B18558701311';

let dir: string;
let cleanup: () => Promise<void>;

beforeEach(async () => {
  ({ dir, cleanup } = await makeTempDir());
});

afterEach(async () => {
  await cleanup();
});

describe('openArgs', () => {
  it('should open the URL directly with the system opener', () => {
    expect(openArgs(CALL_URL, bindBrowser('default'))).toEqual([CALL_URL]);
  });

  it('should open Safari without extra arguments', () => {
    expect(openArgs(CALL_URL, bindBrowser('safari'))).toEqual(['-na', 'Safari', CALL_URL]);
  });

  it('should ask Chromium and Firefox browsers for a new tab', () => {
    expect(openArgs(CALL_URL, bindBrowser('chrome'))).toEqual(['-na', 'Google Chrome', '--args', '--new-tab', CALL_URL]);
    expect(openArgs(CALL_URL, bindBrowser('edge'))).toEqual(['-na', 'Microsoft Edge', '--args', '--new-tab', CALL_URL]);
    expect(openArgs(CALL_URL, bindBrowser('firefox'))).toEqual(['-na', 'Firefox', '--args', '--new-tab', CALL_URL]);
  });
});

describe('MacOSHost', () => {
  it('should find application bundles in any configured directory', async () => {
    const userApps = path.join(dir, 'user');
    await fs.mkdir(path.join(userApps, 'Firefox.app'), { recursive: true });
    const host = new MacOSHost({ applicationDirs: [path.join(dir, 'system'), userApps] });

    expect(await host.isApplicationInstalled('Firefox')).toBe(true);
    expect(await host.isApplicationInstalled('Safari')).toBe(false);
  });

  it('should not count a plain file as a bundle', async () => {
    await fs.writeFile(path.join(dir, 'Safari.app'), '');
    const host = new MacOSHost({ applicationDirs: [dir] });
    expect(await host.isApplicationInstalled('Safari')).toBe(false);
  });

  it('should report the opener as missing when the command does not exist', async () => {
    const host = new MacOSHost({ openCommand: path.join(dir, 'no-open') });
    expect(await host.hasDefaultOpener()).toBe(false);
  });

  it('should report the opener as present when the command is executable', async () => {
    const host = new MacOSHost({ openCommand: process.execPath });
    expect(await host.hasDefaultOpener()).toBe(true);
  });

  it('should raise ExternalOpenError when the opener fails', async () => {
    const host = new MacOSHost({ openCommand: path.join(dir, 'no-open') });
    await expect(host.openUrl(CALL_URL, bindBrowser('default'))).rejects.toThrow(ExternalOpenError);
  });
});
