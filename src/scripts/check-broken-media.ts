import { Logger } from '@nestjs/common';
import { runAudit } from './run-audit';

runAudit('check-broken-media', async (service) => {
    const broken = await service.findBrokenMedia();
    return [
        ...broken.map((entry) =>
            [
                entry.nodeId,
                entry.position === null ? 'node' : `step ${entry.position}`,
                entry.path,
                entry.fileId,
                entry.reason,
            ].join('\t'),
        ),
        `${broken.length} broken media reference(s)`,
    ];
}).catch((error) => {
    Logger.error('check-broken-media could not start', error);
    process.exit(1);
});
