import Fastify, { type FastifyInstance } from 'fastify';
import { HueBridgeClient, LinkButtonNotPressedError, capabilitiesForType, pairWithBridge } from './hue';
import { LightBridgeError } from './light';

// ─── In-process bridge stand-in ───────────────────────────────────────────────

interface FakeHueLight {
  name: string;
  type: string;
  state: { on: boolean; bri?: number; xy?: [number, number]; reachable: boolean };
}

const TOKEN = 'test-token';

function freshLights(): Record<string, FakeHueLight> {
  return {
    '1': {
      name: 'Desk',
      type: 'Extended color light',
      state: { on: true, bri: 200, xy: [0.3, 0.4], reachable: true },
    },
    '2': {
      name: 'Hall plug',
      type: 'On/Off plug-in unit',
      state: { on: false, reachable: true },
    },
  };
}

let server: FastifyInstance;
let address: string;
let lights: Record<string, FakeHueLight>;
let linkButtonPressed = false;
const stateBodies: Array<{ id: string; body: unknown }> = [];

beforeAll(async () => {
  server = Fastify({ logger: false });

  server.post('/api', async () =>
    linkButtonPressed
      ? [{ success: { username: 'paired-user' } }]
      : [{ error: { type: 101, address: '', description: 'link button not pressed' } }],
  );

  server.get(`/api/${TOKEN}/lights`, async () => lights);

  server.get<{ Params: { id: string } }>(`/api/${TOKEN}/lights/:id`, async (req) => {
    const light = lights[req.params.id];
    return light ?? [
      { error: { type: 3, address: `/lights/${req.params.id}`, description: 'resource not available' } },
    ];
  });

  server.put<{ Params: { id: string } }>(`/api/${TOKEN}/lights/:id/state`, async (req) => {
    stateBodies.push({ id: req.params.id, body: req.body });
    return [{ success: { [`/lights/${req.params.id}/state/on`]: true } }];
  });

  server.get('/api/broken-token/lights', async (_req, reply) => reply.code(500).send('boom'));

  await server.listen({ port: 0, host: '127.0.0.1' });
  const bound = server.server.address();
  if (bound === null || typeof bound === 'string') throw new Error('expected a TCP address');
  address = `127.0.0.1:${bound.port}`;
});

afterAll(async () => {
  await server.close();
});

beforeEach(() => {
  lights = freshLights();
  linkButtonPressed = false;
  stateBodies.length = 0;
});

// ─── Tests ────────────────────────────────────────────────────────────────────

describe('capabilitiesForType', () => {
  it('treats color lights as color and brightness capable', () => {
    expect(capabilitiesForType('Extended color light', {})).toEqual({
      supportsColor: true,
      supportsBrightness: true,
    });
  });

  it('treats dimmable lights as brightness only', () => {
    expect(capabilitiesForType('Dimmable light', { bri: 10 })).toEqual({
      supportsColor: false,
      supportsBrightness: true,
    });
  });

  it('treats plugs as on/off only', () => {
    expect(capabilitiesForType('On/Off plug-in unit', {})).toEqual({
      supportsColor: false,
      supportsBrightness: false,
    });
  });
});

describe('HueBridgeClient', () => {
  it('lists lights with explicit capabilities', async () => {
    const client = new HueBridgeClient({ address, authToken: TOKEN });
    const handles = await client.listLights();
    expect(handles.map((h) => [h.id, h.name])).toEqual([
      ['1', 'Desk'],
      ['2', 'Hall plug'],
    ]);
    expect(handles[0].capabilities).toEqual({ supportsColor: true, supportsBrightness: true });
    expect(handles[1].capabilities).toEqual({ supportsColor: false, supportsBrightness: false });
  });

  it('reads live state with brightness and color point', async () => {
    const client = new HueBridgeClient({ address, authToken: TOKEN });
    const desk = await client.getLight('1');
    expect(await desk.readState()).toEqual({ on: true, brightness: 200, colorPoint: [0.3, 0.4] });
  });

  it('translates a patch into the bridge state body', async () => {
    const client = new HueBridgeClient({ address, authToken: TOKEN });
    const desk = await client.getLight('1');
    await desk.applyState({ on: true, brightness: 254, colorPoint: [0.1, 0.2] });
    expect(stateBodies).toEqual([{ id: '1', body: { on: true, bri: 254, xy: [0.1, 0.2] } }]);
  });

  it('never sends brightness to an on/off device', async () => {
    const client = new HueBridgeClient({ address, authToken: TOKEN });
    const plug = await client.getLight('2');
    await plug.applyState({ on: true, brightness: 100 });
    expect(stateBodies).toEqual([{ id: '2', body: { on: true } }]);
  });

  it('surfaces bridge error entries as LightBridgeError', async () => {
    const client = new HueBridgeClient({ address, authToken: TOKEN });
    await expect(client.getLight('9')).rejects.toThrow('Reading light 9 failed: resource not available');
  });

  it('reports HTTP failures', async () => {
    const client = new HueBridgeClient({ address, authToken: 'broken-token' });
    await expect(client.listLights()).rejects.toBeInstanceOf(LightBridgeError);
  });

  it('reports an unreachable bridge', async () => {
    const client = new HueBridgeClient({ address: '127.0.0.1:1', authToken: TOKEN, timeoutMs: 500 });
    await expect(client.listLights()).rejects.toBeInstanceOf(LightBridgeError);
  });
});

describe('pairWithBridge', () => {
  it('asks for the link button until it is pressed', async () => {
    await expect(pairWithBridge(address)).rejects.toBeInstanceOf(LinkButtonNotPressedError);
  });

  it('returns the issued username', async () => {
    linkButtonPressed = true;
    await expect(pairWithBridge(address)).resolves.toBe('paired-user');
  });
});
