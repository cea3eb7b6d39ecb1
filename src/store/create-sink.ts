import { RecorderConfigError } from '../core/errors';
import { MemorySink } from './memory-sink';
import { NdjsonSink } from './ndjson-sink';
import { PostgresSink } from './postgres-sink';
import { NoopSink } from './sink';
import type { Sink } from './sink';

export type SinkOptions =
  | { type: 'noop' }
  | { type: 'memory' }
  | { type: 'ndjson'; path: string }
  | { type: 'postgres'; connectionString?: string };

export const DEFAULT_NDJSON_PATH = './outbound-requests.ndjson';

/** Builds a sink from its file/programmatic description. */
export function createSink(options: SinkOptions): Sink {
  switch (options.type) {
    case 'noop':
      return new NoopSink();
    case 'memory':
      return new MemorySink();
    case 'ndjson':
      return new NdjsonSink(options.path);
    case 'postgres':
      return new PostgresSink({ connectionString: options.connectionString ?? process.env.DATABASE_URL });
    default: {
      const unknownType: unknown = Reflect.get(options, 'type');
      throw new RecorderConfigError('UNSUPPORTED_SINK', `Unsupported sink type: ${String(unknownType)}`);
    }
  }
}
