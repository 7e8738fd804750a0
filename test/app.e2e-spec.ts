import { INestApplication, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import request from 'supertest';
import { EnvironmentVariables } from '../src/config/env.validation';
import { DOCKER_CLIENT } from '../src/docker/docker.constants';
import {
  createApplication,
  documentationBuilder,
} from '../src/utils/bootstrap';
import {
  FakeContainer,
  FakeContainerEngine,
} from './fakes/container-engine.fake';
import {
  BEHAVIOR_PACK_ID,
  RESOURCE_PACK_ID,
  writeLevel,
} from './fakes/levels.fixture';

describe('mc-controller-api (e2e)', () => {
  let app: INestApplication;
  let root: string;
  let engine: FakeContainerEngine;

  beforeAll(async () => {
    Logger.overrideLogger(false);

    root = await mkdtemp(join(tmpdir(), 'mc-controller-'));
    await writeLevel(root, 'Bedrock level', {
      behaviorPacks: JSON.stringify([
        { pack_id: BEHAVIOR_PACK_ID, version: [1, 0, 0] },
      ]),
      resourcePacks: JSON.stringify([
        { name: 'Textures', uuid: RESOURCE_PACK_ID, version: [2, 1, 0] },
      ]),
    });
    await writeLevel(root, 'Alpha');
    await writeFile(join(root, 'worlds', 'notes.txt'), 'not a level');

    // The configuration is validated when the module is first loaded.
    process.env.MC_ROOT = root;
    process.env.MC_DOCKER_NAME = 'bedrock';
    const { AppModule } = await import('../src/app.module');

    engine = new FakeContainerEngine();
    const moduleRef = await Test.createTestingModule({ imports: [AppModule] })
      .overrideProvider(DOCKER_CLIENT)
      .useValue(engine)
      .compile();

    app = moduleRef.createNestApplication();
    createApplication(app);
    documentationBuilder(
      app,
      app.get<ConfigService, ConfigService<EnvironmentVariables, true>>(
        ConfigService,
      ),
    );
    await app.init();
  });

  beforeEach(() => {
    engine.containers.clear();
    engine.containers.set('bedrock', new FakeContainer('exited'));
  });

  afterAll(async () => {
    await app.close();
    await rm(root, { recursive: true, force: true });
  });

  it('GET / reports the package version', async () => {
    const response = await request(app.getHttpServer()).get('/').expect(200);

    expect(response.body).toEqual({ version: '0.2.0' });
  });

  it('GET /levels/ lists the level directories', async () => {
    const response = await request(app.getHttpServer())
      .get('/levels/')
      .expect(200);

    expect(response.body).toEqual([
      { name: 'Alpha', behavior_packs: [], resource_packs: [] },
      {
        name: 'Bedrock level',
        behavior_packs: [{ uuid: BEHAVIOR_PACK_ID, version: [1, 0, 0] }],
        resource_packs: [
          { name: 'Textures', uuid: RESOURCE_PACK_ID, version: [2, 1, 0] },
        ],
      },
    ]);
  });

  it('GET /level/:levelName returns one level', async () => {
    const response = await request(app.getHttpServer())
      .get('/level/Alpha')
      .expect(200);

    expect(response.body).toEqual({
      name: 'Alpha',
      behavior_packs: [],
      resource_packs: [],
    });
  });

  it('GET /level/:levelName answers 404 for an unknown level', async () => {
    const response = await request(app.getHttpServer())
      .get('/level/Nowhere')
      .expect(404);

    expect(response.body).toEqual({
      statusCode: 404,
      message: 'That level was not found!',
      error: 'Not Found',
    });
  });

  it('GET /level/:levelName rejects path traversal', async () => {
    await request(app.getHttpServer()).get('/level/..%2Fsecrets').expect(400);
  });

  it('POST /control/ starts the server and echoes the control', async () => {
    const response = await request(app.getHttpServer())
      .post('/control/')
      .send({ control: { action: 'start', message: 'morning' } })
      .expect(202);

    expect(response.body).toEqual({ action: 'start', message: 'morning' });
    expect(engine.containers.get('bedrock')?.status).toBe('running');
  });

  it('POST /control/ accepts a stop for a stopped server', async () => {
    const response = await request(app.getHttpServer())
      .post('/control/')
      .send({ control: { action: 'stop' } })
      .expect(202);

    expect(response.body).toEqual({ action: 'stop', message: null });
    expect(engine.containers.get('bedrock')?.status).toBe('exited');
  });

  it('POST /control/ rejects unknown actions', async () => {
    await request(app.getHttpServer())
      .post('/control/')
      .send({ control: { action: 'jump' } })
      .expect(400);
  });

  it('POST /control/ requires the control to be embedded', async () => {
    await request(app.getHttpServer())
      .post('/control/')
      .send({ action: 'start' })
      .expect(400);
  });

  it('GET /status/ reports the container state', async () => {
    await request(app.getHttpServer())
      .post('/control/')
      .send({ control: { action: 'restart' } })
      .expect(202);

    const response = await request(app.getHttpServer())
      .get('/status/')
      .expect(200);

    expect(response.body).toEqual({ status: 'running' });
  });

  it('GET /status/ answers 404 without the container', async () => {
    engine.containers.clear();

    const response = await request(app.getHttpServer())
      .get('/status/')
      .expect(404);

    expect(response.body.message).toBe('No such container: bedrock');
  });

  it('serves the OpenAPI document', async () => {
    const response = await request(app.getHttpServer())
      .get('/docs-json')
      .expect(200);

    expect(response.body.info.title).toBe('mc-controller-api');
    expect(response.body.info.version).toBe('0.2.0');
    expect(Object.keys(response.body.paths)).toEqual(
      expect.arrayContaining([
        '/',
        '/levels',
        '/level/{levelName}',
        '/control',
        '/status',
      ]),
    );
  });
});
