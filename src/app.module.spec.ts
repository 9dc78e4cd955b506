import { AppModule } from './app.module';
import { TranscriptionModule } from './modules/transcription/transcription.module';
import { TranscriptionsModule } from './modules/transcriptions/transcriptions.module';

describe('AppModule.forRoot', () => {
  const originalFlag = process.env.REDIS_ENABLED;

  afterEach(() => {
    if (originalFlag === undefined) {
      delete process.env.REDIS_ENABLED;
    } else {
      process.env.REDIS_ENABLED = originalFlag;
    }
  });

  it('loads the queue module when REDIS_ENABLED is true', () => {
    process.env.REDIS_ENABLED = 'true';

    const { imports } = AppModule.forRoot();

    expect(AppModule.isQueueEnabled()).toBe(true);
    expect(imports).toContain(TranscriptionModule);
    expect(imports).toContain(TranscriptionsModule);
  });

  it('leaves the queue out otherwise', () => {
    process.env.REDIS_ENABLED = 'false';

    const { imports } = AppModule.forRoot();

    expect(AppModule.isQueueEnabled()).toBe(false);
    expect(imports).toContain(TranscriptionModule);
    expect(imports).not.toContain(TranscriptionsModule);
  });

  it('lets an explicit option override the environment', () => {
    process.env.REDIS_ENABLED = 'true';

    expect(AppModule.forRoot({ queue: false }).imports).not.toContain(TranscriptionsModule);
  });
});
