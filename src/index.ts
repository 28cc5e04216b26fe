#!/usr/bin/env node
import { Command } from 'commander';
import inquirer from 'inquirer';
import ora from 'ora';
import { AppConfig, LogLevel, SELECTION_MODES, SelectionMode, ServerDirectory } from './types/index.js';

import PiaClient from './api/piaClient.js';
import KeyRegistrar, { loadTrustAnchor } from './api/keyRegistrar.js';
import { countEndpoints, parseDirectory } from './api/directoryParser.js';
import ReachabilityProber from './routing/reachabilityProber.js';
import Provisioner, { enumerateCandidates } from './routing/provisioner.js';
import { listConfigs } from './vpn/wireguardManager.js';
import {
  Credentials,
  getConfig,
  parseList,
  readCredentialsFile,
  readRegionsFile,
  resolveFirst,
  updateConfig,
} from './utils/config.js';
import { SetupError, isProvisioningError, toMessage } from './utils/errors.js';
import { describeEndpoint, resolveServerIndices } from './utils/prompts.js';
import logger from './utils/logger.js';

interface GenerateOptions {
  region?: string;
  mode?: string;
  servers?: string;
  username?: string;
  password?: string;
  credentials: string;
  regionsFile: string;
  output?: string;
  ca?: string;
  debug?: boolean;
}

function isSelectionMode(value: string): value is SelectionMode {
  return SELECTION_MODES.some(mode => mode === value);
}

function applyLogLevel(config: AppConfig, debug?: boolean): void {
  logger.setLogLevel(debug || process.env.DEBUG === '1' ? 'debug' : config.logLevel);
}

function createClient(config: AppConfig): PiaClient {
  return new PiaClient({
    tokenUrl: config.tokenUrl,
    serverListUrl: config.serverListUrl,
    timeoutMs: config.requestTimeout,
  });
}

async function fetchDirectory(client: PiaClient): Promise<ServerDirectory> {
  const spinner = ora('Fetching server list...').start();
  try {
    const directory = parseDirectory(await client.fetchDirectory());
    spinner.succeed(`Fetched ${directory.regions.length} regions with ${countEndpoints(directory)} WireGuard servers`);
    return directory;
  } catch (error) {
    spinner.fail('Failed to fetch server list');
    throw error;
  }
}

async function resolveCredentials(options: GenerateOptions): Promise<Credentials> {
  const resolved = await resolveFirst<Credentials>([
    {
      name: 'credentials from command line',
      load: () => options.username && options.password
        ? { username: options.username, password: options.password }
        : undefined,
    },
    {
      name: 'credentials from environment',
      load: () => process.env.PIA_USER && process.env.PIA_PASS
        ? { username: process.env.PIA_USER, password: process.env.PIA_PASS }
        : undefined,
    },
    {
      name: `credentials from ${options.credentials}`,
      load: () => readCredentialsFile(options.credentials),
    },
    {
      name: 'credentials from prompt',
      load: async () => {
        if (!process.stdin.isTTY) return undefined;
        return inquirer.prompt<Credentials>([
          { type: 'input', name: 'username', message: 'PIA username:' },
          { type: 'password', name: 'password', message: 'PIA password:', mask: '*' },
        ]);
      },
    },
  ]);

  if (!resolved) {
    throw new SetupError('No credentials found. Use --username/--password, PIA_USER/PIA_PASS or a credentials file.');
  }
  return resolved.value;
}

async function resolveRegions(options: GenerateOptions, directory: ServerDirectory, config: AppConfig): Promise<string[]> {
  const resolved = await resolveFirst<string[]>([
    { name: 'regions from command line', load: () => parseList(options.region) },
    { name: `regions from ${options.regionsFile}`, load: () => readRegionsFile(options.regionsFile) },
    { name: 'preferred regions', load: () => config.preferredRegions },
    {
      name: 'region from prompt',
      load: async () => {
        if (!process.stdin.isTTY) return undefined;
        const answer = await inquirer.prompt<{ region: string }>([
          {
            type: 'list',
            name: 'region',
            message: 'Select the region you want to use:',
            pageSize: 20,
            choices: directory.regions.map(region => ({
              name: `${region.id} - ${region.displayName} (${directory.endpoints.get(region.id)?.length ?? 0} servers)`,
              value: region.id,
            })),
          },
        ]);
        return [answer.region];
      },
    },
  ]);

  if (!resolved) {
    throw new SetupError('No region selected. Use --region or a regions file.');
  }
  return resolved.value;
}

async function generate(options: GenerateOptions): Promise<void> {
  const config = getConfig();
  applyLogLevel(config, options.debug);

  const mode = options.mode ?? config.defaultMode;
  if (!isSelectionMode(mode)) {
    throw new SetupError(`Unknown selection mode "${mode}". Use one of: ${SELECTION_MODES.join(', ')}`);
  }

  const caPath = options.ca ?? config.caCertPath;
  const trustAnchor = loadTrustAnchor(caPath);
  logger.debug(`Using CA certificate at ${caPath}`);

  const credentials = await resolveCredentials(options);
  const client = createClient(config);

  const spinner = ora('Authenticating...').start();
  let token: string;
  try {
    token = await client.authenticate(credentials.username, credentials.password);
    spinner.succeed('Authenticated');
  } catch (error) {
    spinner.fail('Authentication failed');
    throw error;
  }

  const directory = await fetchDirectory(client);
  const regionIds = await resolveRegions(options, directory, config);

  const indices = mode === 'manual'
    ? await resolveServerIndices(
        { servers: options.servers, interactive: process.stdin.isTTY === true },
        enumerateCandidates(directory, regionIds)
      )
    : undefined;

  const provisioner = new Provisioner(
    new ReachabilityProber({
      port: config.registrationPort,
      samples: config.probeSamples,
      concurrency: config.concurrency,
    }),
    new KeyRegistrar({ port: config.registrationPort, timeoutMs: config.requestTimeout }),
    {
      outputDir: options.output ?? config.outputDir,
      filePrefix: config.filePrefix,
      probeTimeout: config.probeTimeout,
      concurrency: config.concurrency,
      persistentKeepalive: config.persistentKeepalive,
    }
  );

  const summary = await provisioner.provision({
    directory,
    regionIds,
    mode,
    selection: { indices },
    token,
    trustAnchor,
  });

  console.log(`\nGenerated ${summary.provisioned.length} config(s), skipped ${summary.skipped.length}:`);
  for (const item of summary.provisioned) {
    console.log(`  + ${item.path}`);
  }
  for (const item of summary.skipped) {
    const subject = item.endpoint ? describeEndpoint(item.endpoint) : item.regionId;
    console.log(`  - ${subject}: ${item.kind}: ${item.reason}`);
  }

  if (summary.provisioned.length === 0) {
    process.exitCode = 1;
  }
}

function fail(error: unknown): void {
  if (isProvisioningError(error)) {
    logger.error(`${error.kind}: ${error.message}`);
  } else {
    logger.error(`Error: ${toMessage(error)}`);
  }
  process.exitCode = 1;
}

// Create CLI program
const program = new Command();

program
  .name('wg-provision')
  .description('Generate WireGuard configurations for PIA servers')
  .version('0.1.0');

program
  .command('generate', { isDefault: true })
  .description('Register keys with selected servers and write a config per server')
  .option('-r, --region <ids>', 'Comma-separated list of region ids')
  .option('-m, --mode <mode>', `Server selection: ${SELECTION_MODES.join(', ')}`)
  .option('-s, --servers <indices>', 'Comma-separated server numbers (manual mode)')
  .option('-u, --username <username>', 'Account username')
  .option('-p, --password <password>', 'Account password')
  .option('--credentials <file>', 'Credentials properties file', './credentials.properties')
  .option('--regions-file <file>', 'File listing region ids', './regions.properties')
  .option('-o, --output <dir>', 'Directory for generated configs')
  .option('--ca <file>', 'CA certificate used to verify the key services')
  .option('-d, --debug', 'Verbose output')
  .action(async (options: GenerateOptions) => {
    try {
      await generate(options);
    } catch (error) {
      fail(error);
    }
  });

program
  .command('regions')
  .description('List regions and their WireGuard server counts')
  .action(async () => {
    const config = getConfig();
    applyLogLevel(config);
    try {
      const directory = await fetchDirectory(createClient(config));
      console.log('\nAvailable regions:');
      for (const region of directory.regions) {
        const count = directory.endpoints.get(region.id)?.length ?? 0;
        console.log(`  ${region.id} - ${region.displayName} (${count} servers)`);
      }
    } catch (error) {
      fail(error);
    }
  });

program
  .command('list')
  .description('List generated configurations')
  .option('-o, --output <dir>', 'Directory holding generated configs')
  .action(async (options: { output?: string }) => {
    const outputDir = options.output ?? getConfig().outputDir;
    try {
      const saved = await listConfigs(outputDir);
      if (saved.length === 0) {
        console.log(`No configurations in ${outputDir}`);
        return;
      }
      console.log(`\nConfigurations in ${outputDir}:`);
      for (const entry of saved) {
        console.log(`  ${entry.path} -> ${entry.config.endpoint || 'no endpoint'} (address ${entry.config.address || 'unknown'})`);
      }
    } catch (error) {
      fail(error);
    }
  });

program
  .command('configure')
  .description('Configure the application settings')
  .action(async () => {
    try {
      const config = getConfig();

      const answers = await inquirer.prompt<{
        outputDir: string;
        caCertPath: string;
        defaultMode: SelectionMode;
        preferredRegions: string[];
        logLevel: LogLevel;
      }>([
        {
          type: 'input',
          name: 'outputDir',
          message: 'Output directory:',
          default: config.outputDir,
        },
        {
          type: 'input',
          name: 'caCertPath',
          message: 'CA certificate path:',
          default: config.caCertPath,
        },
        {
          type: 'list',
          name: 'defaultMode',
          message: 'Default selection mode:',
          choices: [...SELECTION_MODES],
          default: config.defaultMode,
        },
        {
          type: 'input',
          name: 'preferredRegions',
          message: 'Preferred regions (comma-separated region ids):',
          default: config.preferredRegions.join(','),
          filter: (input: string) => parseList(input) ?? [],
        },
        {
          type: 'list',
          name: 'logLevel',
          message: 'Log level:',
          choices: ['debug', 'info', 'warn', 'error'],
          default: config.logLevel,
        },
      ]);

      updateConfig(answers);
      console.log('Configuration updated successfully');
    } catch (error) {
      fail(error);
    }
  });

program.parseAsync(process.argv).catch(fail);
