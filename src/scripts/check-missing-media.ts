import { Logger } from '@nestjs/common';
import { runAudit } from './run-audit';

runAudit('check-missing-media', async (service) => {
    const missing = await service.findNodesWithoutMedia();
    return [
        ...missing.map((entry) => `${entry.nodeId}\t${entry.path}`),
        `${missing.length} node(s) without media`,
    ];
}).catch((error) => {
    Logger.error('check-missing-media could not start', error);
    process.exit(1);
});
