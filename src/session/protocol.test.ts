import { createServer, Socket } from 'net';
import type { Server } from 'net';
import {
  decodeLengthHeader,
  encodeLengthHeader,
  secretsMatch,
  serveConnection,
  SocketReader,
} from './protocol.js';
import { AuthenticationMismatch, TransferIncomplete } from '../errors.js';
import { logger } from '../utils/logger.js';

const SECRET = Buffer.from('s3cr3t-token-32bytes-long....', 'utf-8');
const PAYLOAD = Buffer.from('a,b,c\n1,2,3\n', 'utf-8');

function startServer(onConnection: (socket: Socket) => void): Promise<{ server: Server; port: number }> {
  return new Promise((resolve, reject) => {
    const server = createServer(onConnection);
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (!address || typeof address === 'string') {
        reject(new Error('no TCP address'));
        return;
      }
      resolve({ server, port: address.port });
    });
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve) => server.close(() => resolve()));
}

// Send raw bytes and collect everything until the server closes
function exchange(port: number, bytes: Buffer, endAfterWrite = false): Promise<Buffer> {
  return new Promise((resolve) => {
    const chunks: Buffer[] = [];
    const socket = new Socket();
    socket.on('data', (chunk: Buffer) => chunks.push(chunk));
    socket.on('error', () => undefined);
    socket.on('close', () => resolve(Buffer.concat(chunks)));
    socket.connect(port, '127.0.0.1', () => {
      if (endAfterWrite) {
        socket.end(bytes);
      } else if (bytes.length > 0) {
        socket.write(bytes);
      }
    });
  });
}

beforeAll(() => {
  logger.setLevel('silent');
});

describe('length header', () => {
  it('should encode lengths as 4-byte big-endian', () => {
    expect(encodeLengthHeader(12)).toEqual(Buffer.from([0x00, 0x00, 0x00, 0x0c]));
    expect(encodeLengthHeader(0x01020304)).toEqual(Buffer.from([0x01, 0x02, 0x03, 0x04]));
  });

  it('should decode the largest representable length', () => {
    expect(decodeLengthHeader(Buffer.from([0xff, 0xff, 0xff, 0xff]))).toBe(4294967295);
  });

  it('should reject out-of-range lengths and short headers', () => {
    expect(() => encodeLengthHeader(-1)).toThrow(RangeError);
    expect(() => encodeLengthHeader(0x100000000)).toThrow(RangeError);
    expect(() => decodeLengthHeader(Buffer.from([0, 0, 1]))).toThrow(RangeError);
  });
});

describe('secretsMatch', () => {
  it('should match identical secrets only', () => {
    expect(secretsMatch(Buffer.from(SECRET), SECRET)).toBe(true);

    const lastByteDiffers = Buffer.from(SECRET);
    lastByteDiffers[lastByteDiffers.length - 1] ^= 0x01;
    expect(secretsMatch(lastByteDiffers, SECRET)).toBe(false);

    expect(secretsMatch(SECRET.subarray(0, SECRET.length - 1), SECRET)).toBe(false);
    expect(secretsMatch(Buffer.concat([SECRET, Buffer.from('x')]), SECRET)).toBe(false);
  });
});

describe('SocketReader', () => {
  let server: Server;
  let port: number;

  beforeEach(async () => {
    ({ server, port } = await startServer((socket) => {
      socket.write('hello');
      setTimeout(() => socket.end(' world'), 20);
    }));
  });

  afterEach(async () => {
    await closeServer(server);
  });

  it('should accumulate chunks into exact reads', async () => {
    const socket = new Socket();
    const reader = new SocketReader(socket);
    socket.connect(port, '127.0.0.1');

    expect((await reader.readExact(3)).toString()).toBe('hel');
    expect((await reader.readExact(5)).toString()).toBe('lo wo');
    expect((await reader.readExact(3)).toString()).toBe('rld');
    socket.destroy();
  });

  it('should fail with TransferIncomplete when the peer closes early', async () => {
    const socket = new Socket();
    const reader = new SocketReader(socket);
    socket.connect(port, '127.0.0.1');

    const error = await reader.readExact(20).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(TransferIncomplete);
    expect(error).toMatchObject({ expected: 20, received: 11 });
    socket.destroy();
  });

  it('should fail at once on a socket that closed before the reader attached', async () => {
    const socket = new Socket();
    socket.destroy();
    const reader = new SocketReader(socket);

    const error = await reader.readExact(4, 'secret').catch((err: unknown) => err);
    expect(error).toBeInstanceOf(TransferIncomplete);
    expect(error).toMatchObject({ expected: 4, received: 0 });
  });

  it('should return an empty buffer for zero-length reads', async () => {
    const socket = new Socket();
    const reader = new SocketReader(socket);
    expect(await reader.readExact(0)).toEqual(Buffer.alloc(0));
    socket.destroy();
  });
});

describe('serveConnection', () => {
  let server: Server;
  let port: number;
  let outcomes: Promise<number | Error>[];

  beforeEach(async () => {
    outcomes = [];
    ({ server, port } = await startServer((socket) => {
      outcomes.push(
        serveConnection(socket, { secret: SECRET, payload: PAYLOAD, idleTimeoutMs: 100 }).catch(
          (err: Error) => err
        )
      );
    }));
  });

  afterEach(async () => {
    await closeServer(server);
  });

  it('should send the length header and payload after a matching secret', async () => {
    const received = await exchange(port, SECRET);

    expect(received).toEqual(Buffer.concat([Buffer.from([0x00, 0x00, 0x00, 0x0c]), PAYLOAD]));
    expect(await outcomes[0]).toBe(12);
  });

  it('should close without sending anything when the last byte differs', async () => {
    const wrong = Buffer.from(SECRET);
    wrong[wrong.length - 1] ^= 0x01;

    const received = await exchange(port, wrong);

    expect(received).toHaveLength(0);
    expect(await outcomes[0]).toBeInstanceOf(AuthenticationMismatch);
  });

  it('should reject a secret with extra bytes appended', async () => {
    const received = await exchange(port, Buffer.concat([SECRET, Buffer.from('!')]));

    expect(received).toHaveLength(0);
    expect(await outcomes[0]).toBeInstanceOf(AuthenticationMismatch);
  });

  it('should reject a truncated secret when the peer stops sending', async () => {
    const received = await exchange(port, SECRET.subarray(0, SECRET.length - 1), true);

    expect(received).toHaveLength(0);
    expect(await outcomes[0]).toBeInstanceOf(AuthenticationMismatch);
  });

  it('should drop a peer that stays idle', async () => {
    const received = await exchange(port, Buffer.alloc(0));

    expect(received).toHaveLength(0);
    const outcome = await outcomes[0];
    expect(outcome).toBeInstanceOf(AuthenticationMismatch);
    expect(outcome).toMatchObject({ message: 'Authentication failed: peer sent a short secret' });
  });
});
