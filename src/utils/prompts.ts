import inquirer from 'inquirer';
import { Endpoint } from '../types/index.js';
import { SetupError } from './errors.js';

export function describeEndpoint(endpoint: Endpoint): string {
  return `${endpoint.hostname} (${endpoint.ip}) [${endpoint.regionId}]`;
}

export type IndexPrompt = (candidates: Endpoint[]) => Promise<number[]>;

const checkboxPrompt: IndexPrompt = async (candidates) => {
  const answer = await inquirer.prompt<{ indices: number[] }>([
    {
      type: 'checkbox',
      name: 'indices',
      message: 'Select the servers to generate configs for:',
      choices: candidates.map((endpoint, index) => ({ name: `${index}) ${describeEndpoint(endpoint)}`, value: index })),
    },
  ]);
  return answer.indices;
};

export interface ServerIndexOptions {
  servers?: string;
  interactive: boolean;
}

/**
 * Positions into the numbered candidate list for manual selection,
 * from `--servers` or an interactive checkbox
 */
export async function resolveServerIndices(
  options: ServerIndexOptions,
  candidates: Endpoint[],
  prompt: IndexPrompt = checkboxPrompt
): Promise<number[]> {
  if (candidates.length === 0) {
    throw new SetupError('No servers to choose from in the requested regions');
  }

  if (options.servers) {
    return options.servers.split(',').map(item => Number(item.trim()));
  }

  console.log('\nAvailable servers:');
  candidates.forEach((endpoint, index) => {
    console.log(`  ${index}) ${describeEndpoint(endpoint)}`);
  });

  if (!options.interactive) {
    throw new SetupError('Manual mode needs --servers when not running interactively');
  }

  return prompt(candidates);
}
