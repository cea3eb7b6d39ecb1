import type { LoggableIdentity } from '../../types/schema';

function idOf(value: unknown): string | undefined {
  if (typeof value === 'string' && value !== '') return value;
  if (typeof value === 'number' || typeof value === 'bigint') return String(value);
  return undefined;
}

/**
 * Derives the (type, id) pair a sink stores for a loggable reference.
 * Accepts { type, id } / { loggableType, loggableId } descriptors, or any object with an
 * id whose constructor name becomes the type. Anything else has no identity.
 */
export function identifyLoggable(loggable: unknown): LoggableIdentity | undefined {
  if (typeof loggable !== 'object' || loggable === null) return undefined;

  const type: unknown = Reflect.get(loggable, 'type') ?? Reflect.get(loggable, 'loggableType');
  const explicitId = idOf(Reflect.get(loggable, 'loggableId') ?? Reflect.get(loggable, 'id'));
  if (typeof type === 'string' && type !== '' && explicitId) {
    return { type, id: explicitId };
  }

  const ctorName = loggable.constructor?.name;
  if (explicitId && ctorName && ctorName !== 'Object') {
    return { type: ctorName, id: explicitId };
  }
  return undefined;
}
