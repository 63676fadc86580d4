import { jest, describe, it, expect, beforeEach } from '@jest/globals';
import { type AxiosCall, makeConnection, pointItems, response } from './shared-mocks';
import { writeValue } from '../src/value-writer';
import { AmbiguousTagError, InvalidArgumentError, WriteFailedError } from '../src/errors';

const mockGet = jest.fn<AxiosCall>();
const mockPost = jest.fn<AxiosCall>();

jest.mock('axios', () => ({
  __esModule: true,
  default: {
    create: jest.fn(() => ({ get: mockGet, post: mockPost })),
  },
}));

const LOCATION = 'https://piwebapi.example.com/piwebapi/streams/W1/value';
const VALUE = { timestamp: new Date('2025-11-13T21:00:00Z'), value: 12.5 };

describe('writeValue', () => {
  beforeEach(() => {
    mockGet.mockReset();
    mockPost.mockReset();
  });

  it('returns the Location header on 204 No Content', async () => {
    mockPost.mockResolvedValue(response(undefined, 204, { Location: LOCATION }));

    const location = await writeValue(makeConnection(), VALUE, 'Replace', 'BufferIfPossible', {
      webId: 'W1',
    });

    expect(location).toBe(LOCATION);
    expect(mockPost).toHaveBeenCalledWith(
      '/streams/W1/value',
      { Timestamp: '2025-11-13T21:00:00.000Z', Value: 12.5 },
      { params: { updateOption: 'Replace', bufferOption: 'BufferIfPossible' } }
    );
    expect(mockGet).not.toHaveBeenCalled();
  });

  it('accepts 200 OK', async () => {
    mockPost.mockResolvedValue(response({}, 200, { location: LOCATION }));

    await expect(
      writeValue(makeConnection(), VALUE, 'Insert', 'DoNotBuffer', { webId: 'W1' })
    ).resolves.toBe(LOCATION);
  });

  it('fails with WriteFailedError carrying a 4xx response', async () => {
    mockPost.mockResolvedValue(response({ Errors: ['Value rejected'] }, 400));

    const err = await writeValue(makeConnection(), VALUE, 'Replace', 'Buffer', { webId: 'W1' }).catch(
      (e: unknown) => e
    );

    expect(err).toBeInstanceOf(WriteFailedError);
    expect(err).toHaveProperty('response.status', 400);
    expect(err).toHaveProperty('message', 'Failed to write value to WebId W1 (HTTP 400: Value rejected)');
  });

  it('fails when a successful write has no Location header', async () => {
    mockPost.mockResolvedValue(response(undefined, 204));

    await expect(
      writeValue(makeConnection(), VALUE, 'Replace', 'Buffer', { webId: 'W1' })
    ).rejects.toThrow('Write to WebId W1 returned no Location header');
  });

  it('rejects both a WebId and a tag before any request', async () => {
    await expect(
      writeValue(makeConnection(), VALUE, 'Replace', 'Buffer', { webId: 'W1', tag: 'SINUSOID' })
    ).rejects.toThrow(InvalidArgumentError);

    expect(mockGet).not.toHaveBeenCalled();
    expect(mockPost).not.toHaveBeenCalled();
  });

  it('rejects a target with neither WebId nor tag', async () => {
    await expect(writeValue(makeConnection(), VALUE, 'Replace', 'Buffer', {})).rejects.toThrow(
      'Either webId or tag is required to write a value'
    );
    expect(mockPost).not.toHaveBeenCalled();
  });

  it('resolves a tag to its single WebId first', async () => {
    mockGet.mockResolvedValue(response({ Items: [{ Name: 'SINUSOID', WebId: 'W7' }] }));
    mockPost.mockResolvedValue(response(undefined, 204, { Location: LOCATION }));

    await writeValue(makeConnection(), VALUE, 'Replace', 'Buffer', { tag: 'SINUSOID' });

    expect(mockGet).toHaveBeenCalledWith('/search/query', { params: { q: 'name:SINUSOID' } });
    expect(mockPost).toHaveBeenCalledWith('/streams/W7/value', expect.anything(), expect.anything());
  });

  it('does not write when the tag is ambiguous', async () => {
    mockGet.mockResolvedValue(response(pointItems('SINUSOID', 'SINUSOIDU')));

    await expect(
      writeValue(makeConnection(), VALUE, 'Replace', 'Buffer', { tag: 'SINU*' })
    ).rejects.toThrow(AmbiguousTagError);
    expect(mockPost).not.toHaveBeenCalled();
  });
});
