/**
 * Timeline API Tests (in-process Express server)
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import type { Server } from 'http';
import { z } from 'zod';
import { createApp } from '../../../server/app.js';
import { DEFAULT_TIMELINE_CONFIG } from '../../../services/timeline/config.js';

const SAMPLE_SRT = [
  '1',
  '00:00:00,000 --> 00:00:06,000',
  'I like to eat an apple',
  '',
  '2',
  '00:00:06,000 --> 00:00:08,500',
  'Good night',
  '',
].join('\n');

const CreatedSession = z.object({ sessionId: z.string() });
const TimelineJson = z.array(z.object({ start: z.string(), end: z.string(), image: z.array(z.string()) }));

let server: Server;
let baseUrl = '';
let workDir = '';

beforeAll(async () => {
  workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'timeline-api-'));
  const app = createApp({ workDir, config: DEFAULT_TIMELINE_CONFIG });

  server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, () => resolve(listening));
  });

  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Expected a TCP address');
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
  fs.rmSync(workDir, { recursive: true, force: true });
});

function imageBlob(): Blob {
  return new Blob([new Uint8Array([0xff, 0xd8, 0xff, 0xd9])], { type: 'image/jpeg' });
}

async function createSession(title = 'Snack'): Promise<string> {
  const form = new FormData();
  form.append('title', title);
  form.append('srt', new Blob([SAMPLE_SRT], { type: 'application/x-subrip' }), 'talk.srt');

  const res = await fetch(`${baseUrl}/api/timeline/sessions`, { method: 'POST', body: form });
  expect(res.status).toBe(200);
  return CreatedSession.parse(await res.json()).sessionId;
}

async function uploadImages(sessionId: string, splitIndex: number, names: string[]): Promise<Response> {
  const form = new FormData();
  names.forEach(name => form.append('images', imageBlob(), name));
  return fetch(`${baseUrl}/api/timeline/sessions/${sessionId}/splits/${splitIndex}/images`, {
    method: 'POST',
    body: form,
  });
}

describe('GET /api/health', () => {
  it('reports status and session count', async () => {
    const res = await fetch(`${baseUrl}/api/health`);
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({ status: 'ok', sessions: expect.any(Number) });
  });
});

describe('POST /api/timeline/build', () => {
  const post = (body: unknown) =>
    fetch(`${baseUrl}/api/timeline/build`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });

  it('builds the JSON timeline and the FCPXML document', async () => {
    const res = await post({
      title: 'Snack',
      fps: 30,
      segments: [{ text: 'I like to eat an apple', start: '00:00:00,000', end: '00:00:06,000' }],
      images: [{ segmentIndex: 0, splitIndex: 1, images: ['/img/eat.jpg'] }],
    });
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({
      success: true,
      timeline: [
        { start: '00:00:00,000', end: '00:00:03,000', image: [] },
        { start: '00:00:03,000', end: '00:00:06,000', image: ['/img/eat.jpg'] },
      ],
      omittedAssets: [],
      stats: { totalSplits: 2, totalDuration: 6, averageDuration: 3, totalKeywords: 3, averageKeywords: 1.5 },
    });

    const { fcpxml } = z.object({ fcpxml: z.string() }).parse(body);
    expect(fcpxml).toContain('frameDuration="1/30s"');
    expect(fcpxml).toContain('<asset start="0/1s" id="r1" duration="0/1s" name="eat" hasVideo="1">');
    expect(fcpxml).toContain('<gap start="0/1s" offset="0/30s" duration="90/30s" name="Gap"/>');
  });

  it('rejects a request without segments', async () => {
    const res = await post({ title: 'Empty', segments: [] });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ success: false, error: 'segments: at least one segment is required' });
  });

  it('rejects malformed timestamps', async () => {
    const res = await post({ title: 'Bad', segments: [{ text: 'x', start: '0:00', end: '00:00:01,000' }] });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ success: false, error: 'Malformed timestamp: "0:00"' });
  });

  it('answers malformed JSON with 400', async () => {
    const res = await fetch(`${baseUrl}/api/timeline/build`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"title": ',
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ success: false });
  });
});

describe('timeline sessions', () => {
  it('parses the uploaded subtitle into splits', async () => {
    const sessionId = await createSession();
    const res = await fetch(`${baseUrl}/api/timeline/sessions/${sessionId}`);
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({ success: true, sessionId, title: 'Snack' });

    const { splits } = z.object({ splits: z.array(z.unknown()) }).parse(body);
    expect(splits).toHaveLength(3);
    expect(splits[1]).toEqual({
      index: 1,
      segmentIndex: 0,
      splitIndex: 1,
      cueNumber: 1,
      start: '00:00:03,000',
      end: '00:00:06,000',
      text: 'eat an apple',
      keywords: ['eat', 'apple'],
      query: 'eat apple',
      queries: ['apple', 'eat apple'],
      selectedImagesCount: 0,
    });
  });

  it('reports counts when creating a session', async () => {
    const form = new FormData();
    form.append('title', 'Counts');
    form.append('srt', new Blob([SAMPLE_SRT + '\nbroken block\n'], { type: 'application/x-subrip' }), 'talk.srt');

    const res = await fetch(`${baseUrl}/api/timeline/sessions`, { method: 'POST', body: form });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      success: true,
      title: 'Counts',
      segmentsCount: 2,
      splitsCount: 3,
      skipped: [{ blockIndex: 2, reason: 'expected index, timing and text lines' }],
    });
  });

  it('requires the subtitle file', async () => {
    const form = new FormData();
    form.append('title', 'No file');

    const res = await fetch(`${baseUrl}/api/timeline/sessions`, { method: 'POST', body: form });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ success: false, error: 'SRT file is required (field "srt")' });
  });

  it('requires a title', async () => {
    const form = new FormData();
    form.append('srt', new Blob([SAMPLE_SRT]), 'talk.srt');

    const res = await fetch(`${baseUrl}/api/timeline/sessions`, { method: 'POST', body: form });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ success: false, error: 'title: Required' });
  });

  it('answers 404 for unknown sessions', async () => {
    const res = await fetch(`${baseUrl}/api/timeline/sessions/does-not-exist`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ success: false, error: 'Session does-not-exist not found' });
  });

  it('stores uploaded images and replaces an earlier selection', async () => {
    const sessionId = await createSession();

    await uploadImages(sessionId, 1, ['old.jpg']);
    const res = await uploadImages(sessionId, 1, ['one.jpg', 'two.jpg']);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ success: true, splitIndex: 1, selectedCount: 2, images: ['one.jpg', 'two.jpg'] });

    const splitDir = path.join(workDir, sessionId, 'images', '1');
    expect(fs.readdirSync(splitDir).sort()).toEqual(['one.jpg', 'two.jpg']);
  });

  it('keeps the previous selection when a later upload is rejected', async () => {
    const sessionId = await createSession();
    expect((await uploadImages(sessionId, 0, ['ok.jpg'])).status).toBe(200);

    const form = new FormData();
    form.append('images', new Blob(['plain text'], { type: 'text/plain' }), 'notes.txt');
    const rejected = await fetch(`${baseUrl}/api/timeline/sessions/${sessionId}/splits/0/images`, {
      method: 'POST',
      body: form,
    });
    expect(rejected.status).toBe(400);

    const empty = await fetch(`${baseUrl}/api/timeline/sessions/${sessionId}/splits/0/images`, { method: 'POST' });
    expect(empty.status).toBe(400);
    expect(await empty.json()).toEqual({ success: false, error: 'No images uploaded (field "images")' });

    const exported = await fetch(`${baseUrl}/api/timeline/sessions/${sessionId}/export`, { method: 'POST' });
    expect(exported.status).toBe(200);

    const sessionDir = path.join(workDir, sessionId);
    const okPath = path.join(sessionDir, 'images', '0', 'ok.jpg');
    const written = TimelineJson.parse(JSON.parse(fs.readFileSync(path.join(sessionDir, 'Snack_timeline.json'), 'utf-8')));
    expect(written[0]?.image).toEqual([okPath]);
    expect(fs.existsSync(okPath)).toBe(true);
    expect(fs.readdirSync(path.join(sessionDir, 'images'))).toEqual(['0']);
  });

  it('stores files sharing a name under distinct names', async () => {
    const sessionId = await createSession();
    const res = await uploadImages(sessionId, 2, ['dup.jpg', 'dup.jpg']);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ success: true, splitIndex: 2, selectedCount: 2, images: ['dup.jpg', '1_dup.jpg'] });
    expect(fs.readdirSync(path.join(workDir, sessionId, 'images', '2')).sort()).toEqual(['1_dup.jpg', 'dup.jpg']);
  });

  it('rejects uploads that are not images', async () => {
    const sessionId = await createSession();
    const form = new FormData();
    form.append('images', new Blob(['plain text'], { type: 'text/plain' }), 'notes.txt');

    const res = await fetch(`${baseUrl}/api/timeline/sessions/${sessionId}/splits/0/images`, {
      method: 'POST',
      body: form,
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ success: false, error: 'Not an image: notes.txt (text/plain)' });
  });

  it('rejects split indexes outside the session', async () => {
    const sessionId = await createSession();
    const res = await fetch(`${baseUrl}/api/timeline/sessions/${sessionId}/splits/9/images`, { method: 'POST' });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ success: false, error: 'Split index 9 out of range (0-2)' });
  });

  it('exports the timeline files and serves them for download', async () => {
    const sessionId = await createSession();
    await uploadImages(sessionId, 1, ['one.jpg', 'two.jpg']);

    const res = await fetch(`${baseUrl}/api/timeline/sessions/${sessionId}/export`, { method: 'POST' });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      success: true,
      timelineFile: 'Snack_timeline.json',
      fcpxmlFile: 'Snack_timeline.fcpxml',
      totalEntries: 3,
      omittedAssets: [],
    });

    const sessionDir = path.join(workDir, sessionId);
    const written = TimelineJson.parse(JSON.parse(fs.readFileSync(path.join(sessionDir, 'Snack_timeline.json'), 'utf-8')));
    expect(written).toEqual([
      { start: '00:00:00,000', end: '00:00:03,000', image: [] },
      {
        start: '00:00:03,000',
        end: '00:00:06,000',
        image: [path.join(sessionDir, 'images', '1', 'one.jpg'), path.join(sessionDir, 'images', '1', 'two.jpg')],
      },
      { start: '00:00:06,000', end: '00:00:08,500', image: [] },
    ]);

    const download = await fetch(`${baseUrl}/api/timeline/sessions/${sessionId}/files/Snack_timeline.fcpxml`);
    expect(download.status).toBe(200);
    expect(download.headers.get('content-disposition')).toContain('Snack_timeline.fcpxml');
    expect(await download.text()).toBe(fs.readFileSync(path.join(sessionDir, 'Snack_timeline.fcpxml'), 'utf-8'));
  });

  it('answers 404 for files that were never exported', async () => {
    const sessionId = await createSession();
    const res = await fetch(`${baseUrl}/api/timeline/sessions/${sessionId}/files/nope.json`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ success: false, error: 'File nope.json not found' });
  });

  it('deletes a session together with its directory', async () => {
    const sessionId = await createSession();
    const sessionDir = path.join(workDir, sessionId);
    expect(fs.existsSync(sessionDir)).toBe(true);

    const res = await fetch(`${baseUrl}/api/timeline/sessions/${sessionId}`, { method: 'DELETE' });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ success: true, sessionId });
    expect(fs.existsSync(sessionDir)).toBe(false);

    const again = await fetch(`${baseUrl}/api/timeline/sessions/${sessionId}`);
    expect(again.status).toBe(404);
  });
});
