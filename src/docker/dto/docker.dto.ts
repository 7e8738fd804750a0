export const CONTAINER_ACTIONS = ['start', 'stop', 'restart'] as const;

export type ContainerAction = (typeof CONTAINER_ACTIONS)[number];

export const CONTAINER_STATUSES = [
  'created',
  'restarting',
  'running',
  'removing',
  'paused',
  'exited',
  'dead',
] as const;

export type ContainerStatus = (typeof CONTAINER_STATUSES)[number];

/**
 * The part of a Docker container handle this service relies on. dockerode's
 * `Container` satisfies it.
 */
export interface ContainerHandle {
  start(): Promise<unknown>;
  stop(): Promise<unknown>;
  restart(): Promise<unknown>;
  inspect(): Promise<{ State: { Status: string } }>;
}

export interface ContainerEngine {
  getContainer(id: string): ContainerHandle;
}
