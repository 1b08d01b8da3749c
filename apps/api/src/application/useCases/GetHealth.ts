import type { HealthResponse } from '@docent/types';
import type { ChunkStore } from '../../domain/entities/ChunkStore';

export class GetHealth {
    constructor(
        private store: ChunkStore,
        private snapshotReady: () => Promise<boolean>
    ) {}

    async execute(): Promise<HealthResponse> {
        const filesPresent = await this.snapshotReady();

        return {
            status: 'healthy',
            index_ready: filesPresent && this.store.size > 0,
            chunks: this.store.size,
        };
    }
}
