import { fsa, FsS3 } from '@linzjs/s3fs';
import * as AWS from 'aws-sdk';
import S3 from 'aws-sdk/clients/s3';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { LogType } from './log';

const configPath = path.join(os.homedir(), '.aws', 'fsa.json');

const roleConfigSchema = z.object({ roleArn: z.string().min(1), source: z.string().optional() });

/**
 * Register `s3://` on fsa, so releases can be fetched straight from a bucket
 *
 * @param flags.endpoint custom S3 endpoint, eg a local minio `localhost` becomes `http://localhost:8080`
 */
export async function registerFileSystems(flags: { endpoint?: string }, log: LogType): Promise<void> {
  let endpoint = flags.endpoint;
  if (endpoint != null && !endpoint.startsWith('http')) endpoint = 'http://' + endpoint + ':8080';

  const client = endpoint ? new S3({ endpoint, s3ForcePathStyle: true }) : new S3();
  fsa.register('s3://', new FsS3(client));

  await registerRoles(log);
}

function tryParseJson(x: string | Buffer): unknown {
  try {
    const value: unknown = JSON.parse(x.toString());
    return value;
  } catch (e) {
    return null;
  }
}

/** Read `~/.aws/fsa.json`, a map of s3 prefix to the role used to read it */
async function registerRoles(log: LogType): Promise<void> {
  const fileExists = await fsa.exists(configPath);
  if (!fileExists) return;
  const config = tryParseJson(await fsa.read(configPath));
  if (typeof config !== 'object' || config == null) return;

  for (const [prefix, obj] of Object.entries(config)) {
    if (!prefix.startsWith('s3://')) {
      log.debug({ prefix }, 'FsaConfig:InvalidPrefix - Missing s3://');
      continue;
    }
    const parsed = roleConfigSchema.safeParse(obj);
    if (!parsed.success) {
      log.debug({ prefix, cfg: obj }, 'FsaConfig:InvalidConfig - Missing "roleArn"');
      continue;
    }
    const { roleArn, source } = parsed.data;
    const sourceCredentials =
      source === 'Ec2InstanceMetadata'
        ? new AWS.EC2MetadataCredentials()
        : new AWS.SharedIniFileCredentials({ profile: source ?? process.env['AWS_PROFILE'] });

    const credentials = new AWS.ChainableTemporaryCredentials({
      params: { RoleArn: roleArn, RoleSessionName: 'fsa-' + Math.random().toString(32) + '-' + Date.now() },
      masterCredentials: sourceCredentials,
    });

    log.debug({ prefix, source, roleArn }, 'RegisterS3');
    fsa.register(prefix, new FsS3(new S3({ credentials })));
  }
}
