import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { FastifyInstance } from 'fastify';
import { createServer } from './server.js';
import { MetricsService } from './services/metrics.js';

const PLAYLIST_CSV = [
  'Artist,Title,Key,BPM',
  'Alpha,First,9A,122',
  'Beta,Second,8A,128',
  'Gamma,Third,8A,120',
  '',
].join('\n');

describe('Harmonic Flow HTTP API', () => {
  let app: FastifyInstance;
  let metrics: MetricsService;

  beforeEach(async () => {
    metrics = new MetricsService();
    app = await createServer({ metrics });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  it('should report health', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({
      status: 'healthy',
      services: { keyNotations: true },
      environment: 'test',
    });
  });

  it('should echo the request id header', async () => {
    const response = await app.inject({
      method: 'GET',
      url: '/health',
      headers: { 'x-request-id': 'test-request-1' },
    });

    expect(response.headers['x-request-id']).toBe('test-request-1');
  });

  it('should optimize a JSON playlist', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/v1/playlists/optimize',
      payload: {
        energyPolicy: 'ramp_up',
        tracks: [
          { artist: 'Alpha', title: 'Opener', bpm: 128, key: 'Am' },
          { artist: 'Beta', title: 'Bridge', bpm: '122', key: '9A' },
          { artist: 'Gamma', title: 'Lift', bpm: 126, key: 'B' },
          { artist: 'Delta', title: 'Warmup', bpm: 120, key: '08A' },
        ],
      },
    });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.tracks.map((track: { title: string }) => track.title)).toEqual(['Warmup', 'Opener', 'Bridge', 'Lift']);
    expect(body.keyPath).toEqual(['8A', '9A', '1B']);
    expect(body.keyPathNames).toEqual(['A minor', 'E minor', 'B major']);
    expect(body.energyPolicy).toBe('ramp_up');
    expect(body.tracks[2].bpm).toBe(122);
  });

  it('should default the energy policy', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/v1/playlists/optimize',
      payload: { tracks: [{ key: '8A' }] },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json().energyPolicy).toBe('ramp_up');
    expect(response.json().tracks).toEqual([{ artist: '', title: '', bpm: null, key: '8A' }]);
  });

  it('should reject an unknown energy policy', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/v1/playlists/optimize',
      payload: { tracks: [], energyPolicy: 'sideways' },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ error: true, code: 'VALIDATION_ERROR' });
    expect(response.json().issues[0].path).toBe('energyPolicy');
  });

  it('should reject a body without tracks', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/v1/playlists/optimize',
      payload: { energyPolicy: 'wave' },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().issues[0].path).toBe('tracks');
  });

  it('should import and reorder an uploaded CSV', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/v1/playlists/import?filename=set.csv',
      headers: { 'content-type': 'text/csv' },
      payload: PLAYLIST_CSV,
    });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.format).toBe('csv');
    expect(body.columns).toEqual({ artist: 'Artist', title: 'Title', key: 'Key', bpm: 'BPM' });
    expect(body.tracks.map((track: { title: string }) => track.title)).toEqual(['First', 'Third', 'Second']);
    expect(body.summary).toEqual({ trackCount: 3, startBpm: 122 });
  });

  it('should return the reordered upload as a CSV download', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/v1/playlists/import?format=csv&output=csv',
      headers: { 'content-type': 'text/plain' },
      payload: PLAYLIST_CSV,
    });

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toBe('text/csv; charset=utf-8');
    expect(response.headers['content-disposition']).toBe('attachment; filename="harmonic_flow_sorted.csv"');
    expect(response.body).toBe(
      'Artist,Title,Key,BPM\n' +
      'Alpha,First,9A,122\n' +
      'Gamma,Third,8A,120\n' +
      'Beta,Second,8A,128\n'
    );
  });

  it('should reject an upload without a key column', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/v1/playlists/import?format=csv',
      headers: { 'content-type': 'text/csv' },
      payload: 'Artist,Title\nAlpha,First\n',
    });

    expect(response.statusCode).toBe(422);
    expect(response.json()).toMatchObject({ error: true, code: 'MISSING_KEY_COLUMN' });
  });

  it('should reject an unknown upload format', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/v1/playlists/import?format=m3u',
      headers: { 'content-type': 'text/plain' },
      payload: '#EXTM3U\n',
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().code).toBe('UNSUPPORTED_FORMAT');
  });

  it('should reject a JSON body on the upload route', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/v1/playlists/import?format=csv',
      payload: { tracks: [] },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().code).toBe('UNSUPPORTED_FORMAT');
  });

  it('should export tracks as CSV', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/v1/playlists/export',
      payload: {
        tracks: [{ artist: 'Alpha', title: 'First', bpm: 128, key: '8A' }],
        columns: { artist: 'Artist', key: 'Key' },
      },
    });

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-disposition']).toBe('attachment; filename="harmonic_flow_sorted.csv"');
    expect(response.body).toBe('Artist,Key\nAlpha,8A\n');
  });

  it('should expose optimizer metrics', async () => {
    await app.inject({
      method: 'POST',
      url: '/api/v1/playlists/optimize',
      payload: { tracks: [{ key: '8A' }, { key: '9A' }], energyPolicy: 'wave' },
    });

    const response = await app.inject({ method: 'GET', url: '/metrics' });

    expect(response.statusCode).toBe(200);
    expect(response.body).toContain('playlist_optimizations_total{policy="wave",algorithm="trivial"} 1');
  });
});
