/**
 * Error types raised by the RAG core.
 *
 * Store and chat-model failures are not wrapped: whatever the client library
 * throws reaches the caller unchanged.
 */

export class RagError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Settings that cannot work, e.g. a chunk overlap that is not smaller than
 * the chunk size.
 */
export class InvalidConfigurationError extends RagError {}

/**
 * The chat model's reply exposed its text through none of the known shapes.
 */
export class UnrecognizedResponseShapeError extends RagError {
  constructor(readonly response: unknown) {
    super('Chat response exposes no answer text via message.content or choices[0].message.content');
  }
}

/**
 * The vector store returned results that are not rank-aligned or lack
 * provenance metadata.
 */
export class StoreResponseShapeError extends RagError {}

/**
 * Two different sources would write the same chunk id.
 */
export class ChunkIdCollisionError extends RagError {
  constructor(
    readonly chunkId: string,
    readonly existingSource: string,
    readonly incomingSource: string
  ) {
    super(
      `Chunk id "${chunkId}" from "${incomingSource}" collides with a chunk from "${existingSource}"`
    );
  }
}
