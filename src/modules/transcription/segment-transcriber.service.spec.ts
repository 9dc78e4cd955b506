import { SegmentTranscriberService } from './segment-transcriber.service';
import { SegmentJob } from './transcription.types';
import {
  FakeRemoteTranscriber,
  RemoteScript,
  createFakeFfmpeg,
  createTranscriptionTestingModule,
} from '../../testing/fakes';

const PAYLOAD_ERROR = 'Payload length is 50000, exceeding max payload length of 10000';

const job: SegmentJob = { path: '/work/seg000.mp3', startOffset: 0, endOffset: 30, depth: 0, index: 0 };

async function setup(script: RemoteScript, retryBackoffMs = 0) {
  const remote = new FakeRemoteTranscriber(script);
  const moduleRef = await createTranscriptionTestingModule({
    remote,
    ffmpeg: createFakeFfmpeg(),
    config: { transcription: { retryBackoffMs } },
  });
  return { remote, transcriber: moduleRef.get(SegmentTranscriberService) };
}

describe('SegmentTranscriberService', () => {
  it('joins cleaned chunks with newlines', async () => {
    const zwsp = String.fromCharCode(0x200b);
    const { transcriber, remote } = await setup(() => ['  Speaker 0: hi', `there${zwsp}`]);

    const result = await transcriber.transcribe(job, 2);

    expect(result).toEqual({ kind: 'text', index: 0, text: 'Speaker 0: hi\nthere', startOffset: 0, endOffset: 30 });
    expect(remote.calls).toEqual(['/work/seg000.mp3']);
  });

  it('makes maxRetries + 1 attempts and reports the last error', async () => {
    let attempt = 0;
    const { transcriber, remote } = await setup(() => new Error(`boom #${++attempt}`));

    const result = await transcriber.transcribe(job, 2);

    expect(remote.calls).toHaveLength(3);
    expect(result).toEqual({
      kind: 'text',
      index: 0,
      text: '[Transcription failed - 00:00:00 - 00:00:30 Reason: boom #3]',
      startOffset: 0,
      endOffset: 30,
    });
  });

  it('treats an empty transcription as a retryable failure', async () => {
    const { transcriber, remote } = await setup(() => ['', '   ']);

    const result = await transcriber.transcribe(job, 1);

    expect(remote.calls).toHaveLength(2);
    expect(result.kind === 'text' && result.text).toBe(
      '[Transcription failed - 00:00:00 - 00:00:30 Reason: empty transcription]',
    );
  });

  it('recovers when a later attempt succeeds', async () => {
    let attempt = 0;
    const { transcriber, remote } = await setup(() => (++attempt === 1 ? new Error('timeout') : ['ok']));

    const result = await transcriber.transcribe(job, 2);

    expect(remote.calls).toHaveLength(2);
    expect(result.kind === 'text' && result.text).toBe('ok');
  });

  it('returns a split signal on a payload-size error without retrying', async () => {
    const { transcriber, remote } = await setup(() => new Error(PAYLOAD_ERROR));

    const result = await transcriber.transcribe({ ...job, depth: 2, index: 4 }, 3);

    expect(remote.calls).toHaveLength(1);
    expect(result).toEqual({
      kind: 'split',
      index: 4,
      path: '/work/seg000.mp3',
      startOffset: 0,
      endOffset: 30,
      depth: 2,
    });
  });

  it('backs off linearly between attempts', async () => {
    const { transcriber } = await setup(() => new Error('boom'), 20);

    const startedAt = Date.now();
    await transcriber.transcribe(job, 2);

    // 20ms + 40ms
    expect(Date.now() - startedAt).toBeGreaterThanOrEqual(55);
  });
});
