export const DOCKER_CLIENT = Symbol('DOCKER_CLIENT');
