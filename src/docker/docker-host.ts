import type { DockerOptions } from 'dockerode';

type RemoteProtocol = 'http' | 'https' | 'ssh';

const REMOTE_SCHEMES = new Map<string, RemoteProtocol>([
  ['tcp', 'http'],
  ['http', 'http'],
  ['https', 'https'],
  ['ssh', 'ssh'],
]);

const DEFAULT_PORTS: Record<RemoteProtocol, number> = {
  http: 2375,
  https: 2376,
  ssh: 22,
};

/**
 * Translates a Docker Engine address such as `unix://var/run/docker.sock` or
 * `tcp://10.0.0.5:2375` into dockerode connection options.
 *
 * `unix://var/run/docker.sock` and `unix:///var/run/docker.sock` both name
 * the socket at `/var/run/docker.sock`.
 */
export function parseDockerHost(baseUrl: string): DockerOptions {
  const match = /^([a-z]+):\/\/(.*)$/.exec(baseUrl.trim());
  if (!match) {
    throw new Error(`Invalid Docker base URL: ${baseUrl}`);
  }
  const [, scheme, rest] = match;

  if (scheme === 'unix') {
    const socketPath = '/' + rest.replace(/^\/+/, '');
    if (socketPath === '/') {
      throw new Error(`Missing socket path in Docker base URL: ${baseUrl}`);
    }
    return { socketPath };
  }

  if (scheme === 'npipe') {
    return { socketPath: rest.replace(/\//g, '\\') };
  }

  const protocol = REMOTE_SCHEMES.get(scheme);
  if (!protocol) {
    throw new Error(`Unsupported Docker base URL scheme: ${scheme}`);
  }

  // A non-special scheme keeps default ports such as :80 in `url.port`.
  const url = new URL(`docker://${rest}`);
  if (!url.hostname) {
    throw new Error(`Missing host in Docker base URL: ${baseUrl}`);
  }
  const options: DockerOptions = {
    protocol,
    host: url.hostname,
    port: url.port ? Number(url.port) : DEFAULT_PORTS[protocol],
  };
  if (protocol === 'ssh' && url.username) {
    options.username = decodeURIComponent(url.username);
  }
  return options;
}
