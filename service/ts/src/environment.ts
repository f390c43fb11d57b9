import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const METADATA_BASE_URL = 'http://metadata.google.internal/computeMetadata/v1/';
const METADATA_TIMEOUT_MS = 5_000;
const GCLOUD_TIMEOUT_MS = 5_000;

type Env = Record<string, string | undefined>;

/** Runs a command and resolves with its trimmed stdout. */
export type CommandRunner = (command: string, args: string[]) => Promise<string>;

export interface EnvironmentSources {
  env?: Env;
  fetchImpl?: typeof fetch;
  runCommand?: CommandRunner;
}

const execFileAsync = promisify(execFile);

const execCommand: CommandRunner = async (command, args) => {
  const { stdout } = await execFileAsync(command, args, { timeout: GCLOUD_TIMEOUT_MS });
  return stdout.trim();
};

const logUnavailable = (event: string, context: Record<string, string>, err: unknown) => {
  if (process.env.NODE_ENV !== 'test') {
    console.debug(event, { ...context, message: err instanceof Error ? err.message : String(err) });
  }
};

export const isCloudRun = (env: Env = process.env) =>
  Boolean(env.K_SERVICE || env.K_REVISION || env.K_CONFIGURATION);

export const getServiceName = (env: Env = process.env) => env.K_SERVICE ?? null;

const readMetadata = async (path: string, fetchImpl: typeof fetch): Promise<string | null> => {
  try {
    const response = await fetchImpl(new URL(path, METADATA_BASE_URL), {
      headers: { 'Metadata-Flavor': 'Google' },
      signal: AbortSignal.timeout(METADATA_TIMEOUT_MS),
    });
    if (response.status !== 200) return null;
    const text = (await response.text()).trim();
    return text || null;
  } catch (err) {
    // off Google Cloud the metadata host does not resolve
    logUnavailable('metadata_unavailable', { path }, err);
    return null;
  }
};

const readGcloudProject = async (run: CommandRunner): Promise<string | null> => {
  try {
    const project = await run('gcloud', ['config', 'get-value', 'project']);
    return project || null;
  } catch (err) {
    logUnavailable('gcloud_unavailable', { command: 'gcloud config get-value project' }, err);
    return null;
  }
};

/** Project id from env, then the metadata server, then the local gcloud configuration. */
export const getProjectId = async ({
  env = process.env,
  fetchImpl = fetch,
  runCommand: run = execCommand,
}: EnvironmentSources = {}) =>
  env.GOOGLE_CLOUD_PROJECT ||
  env.GCP_PROJECT ||
  (await readMetadata('project/project-id', fetchImpl)) ||
  (await readGcloudProject(run));

/** Region from env, or the last segment of `projects/<n>/regions/<region>` from the metadata server. */
export const getRegion = async ({ env = process.env, fetchImpl = fetch }: EnvironmentSources = {}) => {
  const configured = env.GOOGLE_CLOUD_REGION || env.CLOUD_RUN_REGION;
  if (configured) return configured;
  const path = await readMetadata('instance/region', fetchImpl);
  return path ? path.split('/').pop() ?? null : null;
};

export interface EnvironmentInfo {
  projectId: string | null;
  region: string | null;
  serviceName: string | null;
  isCloudRun: boolean;
}

export const describeEnvironment = async (sources: EnvironmentSources = {}): Promise<EnvironmentInfo> => {
  const env = sources.env ?? process.env;
  return {
    projectId: await getProjectId(sources),
    region: await getRegion(sources),
    serviceName: getServiceName(env),
    isCloudRun: isCloudRun(env),
  };
};

export const logEnvironment = async (sources: EnvironmentSources = {}) => {
  const info = await describeEnvironment(sources);
  console.log('Google Cloud environment', info);
  if (!info.projectId) {
    console.warn('Could not detect a Google Cloud project id; running outside Google Cloud?');
  }
  return info;
};
