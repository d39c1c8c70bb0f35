import crypto from 'crypto';
import {
    InMemoryJobStore,
    JobStatus,
    MediaReference,
    pollUntilTerminal,
    resolveConfig,
    toStatusView,
    Veriframe
} from '../core/src/index';

// A minimal MP4 header followed by filler, kept in memory
function sampleVideo(): Buffer {
    const buffer = Buffer.alloc(4096);
    buffer.writeUInt32BE(24, 0);
    buffer.write('ftypisom', 4, 'ascii');
    crypto.randomFillSync(buffer, 12);
    return buffer;
}

async function main() {
    console.log('--- Staged Deepfake Analysis (TypeScript) ---');

    const content = sampleVideo();
    const media: MediaReference = {
        id: 'media-example',
        filename: 'interview.mp4',
        storagePath: 'memory://interview.mp4',
        sizeBytes: content.length,
        mimeType: 'video/mp4',
        contentHash: crypto.createHash('sha256').update(content).digest('hex')
    };

    const store = new InMemoryJobStore();
    const veriframe = new Veriframe({
        store,
        config: resolveConfig({ stageDelayMs: 150 }),
        readMedia: async () => content
    });

    const outcome = await veriframe.analyze(media);
    console.log('Job:', outcome.job.id);

    const final = await pollUntilTerminal(
        async () => {
            const job = await store.get(outcome.job.id);
            return job ? toStatusView(job) : null;
        },
        {
            jobId: outcome.job.id,
            intervalMs: 100,
            onUpdate: (status) => console.log(`[${String(status.progressPercent).padStart(3)}%] ${status.label}`)
        }
    );

    if (final.status === JobStatus.FAILED) {
        console.error('\n[ERROR] Analysis failed:', final.errorMessage);
        process.exit(1);
    }

    const report = await veriframe.report(outcome.job.id);

    console.log('\n--- Verdict ---');
    console.log('Label:', report.verdict.label);
    console.log('Score:', `${report.verdict.overallPercent}%`);
    console.log(report.verdict.summary);
    console.log('Segments:', JSON.stringify(report.segments, null, 2));
}

main().catch((error) => {
    console.error('Example failed:', error);
    process.exit(1);
});
