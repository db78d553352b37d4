import { resetLogger } from '@linkstack/contracts';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from 'vitest';

import { createSynthCommand } from '../src/commands/synth';

vi.mock('chalk', () => ({
  default: {
    blue: vi.fn((msg) => msg),
    cyan: vi.fn((msg) => msg),
    gray: vi.fn((msg) => msg),
    green: vi.fn((msg) => msg),
    red: vi.fn((msg) => msg),
    yellow: vi.fn((msg) => msg),
    bold: Object.assign(
      vi.fn((msg) => msg),
      { green: vi.fn((msg) => msg) }
    ),
  },
}));

describe('Synth Command', () => {
  let tmpDir: string;
  let configPath: string;
  let consoleLogSpy: MockInstance<typeof console.log>;
  let consoleErrorSpy: MockInstance<typeof console.error>;
  let processExitSpy: MockInstance<typeof process.exit>;

  const writeConfig = (config: object) => fs.writeFileSync(configPath, JSON.stringify(config));
  const logged = () => consoleLogSpy.mock.calls.map((call) => call.join(' '));

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'linkstack-cli-test-'));
    configPath = path.join(tmpDir, 'linkstack.config.json');

    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    processExitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);

    writeConfig({
      stackName: 'QuickLinkStack',
      account: '123456789012',
      region: 'eu-west-1',
      codePath: 'build/quicklink.jar',
      throttling: { rateLimit: 50, burstLimit: 100 },
      outDir: path.join(tmpDir, 'out'),
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    resetLogger();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should write the template and print the manifest', async () => {
    await createSynthCommand().parseAsync(['node', 'linkstack', '--config', configPath]);

    const templatePath = path.join(tmpDir, 'out', 'QuickLinkStack.template.json');
    expect(fs.existsSync(templatePath)).toBe(true);
    expect(logged()).toContain('Synthesizing QuickLinkStack...');
    expect(logged()).toContain(`✓ 5 resources, 4 grants written to ${templatePath}`);
    expect(logged()).toContain('LambdaFunctionName = quicklink-service');
    expect(logged()).toContain('AnalyticsQueueUrl = https://sqs.eu-west-1.amazonaws.com/123456789012/quicklink-analytics');
    expect(processExitSpy).not.toHaveBeenCalled();
  });

  it('should leave the queue out with --no-analytics', async () => {
    await createSynthCommand().parseAsync(['node', 'linkstack', '--config', configPath, '--no-analytics']);

    const templatePath = path.join(tmpDir, 'out', 'QuickLinkStack.template.json');
    const template = JSON.parse(fs.readFileSync(templatePath, 'utf8'));

    expect(Object.keys(template.Resources)).not.toContain('AnalyticsQueue');
    expect(logged()).toContain(`✓ 4 resources, 3 grants written to ${templatePath}`);
  });

  it('should let flags override the configured environment and directory', async () => {
    const outDir = path.join(tmpDir, 'elsewhere');
    await createSynthCommand().parseAsync(['node', 'linkstack', '--config', configPath, '--region', 'ap-south-1', '--account', '210987654321', '--out', outDir]);

    const template = JSON.parse(fs.readFileSync(path.join(outDir, 'QuickLinkStack.template.json'), 'utf8'));
    expect(template.Metadata).toEqual({ StackName: 'QuickLinkStack', Account: '210987654321', Region: 'ap-south-1' });
  });

  it('should print every added resource with --verbose', async () => {
    await createSynthCommand().parseAsync(['node', 'linkstack', '--config', configPath, '--verbose']);

    expect(logged()).toContain('+ Table UrlsTable');
    expect(logged()).toContain('+ ApiGateway QuickLinkApi');
  });

  it('should point at init when the config is missing', async () => {
    const missing = path.join(tmpDir, 'missing.json');
    await createSynthCommand().parseAsync(['node', 'linkstack', '--config', missing]);

    expect(consoleErrorSpy).toHaveBeenCalledWith(`Error: ${missing} not found. Run \`linkstack init\` first.`);
    expect(processExitSpy).toHaveBeenCalledWith(1);
  });

  it('should report an invalid config', async () => {
    writeConfig({ stackName: 'QuickLinkStack' });
    await createSynthCommand().parseAsync(['node', 'linkstack', '--config', configPath]);

    expect(consoleErrorSpy).toHaveBeenCalledWith('Synthesis failed:', `Invalid configuration in ${configPath}`);
    expect(processExitSpy).toHaveBeenCalledWith(1);
  });

  it('should report a composition error and write nothing', async () => {
    writeConfig({
      stackName: 'QuickLinkStack',
      codePath: '',
      throttling: { rateLimit: 50, burstLimit: 100 },
      outDir: path.join(tmpDir, 'out'),
    });
    await createSynthCommand().parseAsync(['node', 'linkstack', '--config', configPath]);

    expect(consoleErrorSpy).toHaveBeenCalledWith('Synthesis failed:', '[MissingProperty] Resource "QuickLinkFunction" is missing required property "code"');
    expect(fs.existsSync(path.join(tmpDir, 'out'))).toBe(false);
    expect(processExitSpy).toHaveBeenCalledWith(1);
  });
});
