export class Chunk {
    constructor(
        public readonly id: string,
        public readonly page: number,
        public readonly text: string,
        public readonly tokenCount: number,
        public readonly diagramIds: readonly string[],
        public readonly media: readonly string[],
        public readonly isTable: boolean
    ) {}
}
