import { getLoggerFor } from 'global-logger-factory';
import type { ClusterApiClient } from '../cluster/ClusterApiClient';
import { RemoteQueryError } from '../errors/ProvisioningError';
import type { EventStateStore } from '../state/EventStateStore';
import { isValidEventId } from '../state/EventStateStore';
import { parseJson } from '../util/parseJson';

/**
 * 解析 eventId 接口的响应：JSON 对象 (event_id / eventId)、JSON 字符串、纯文本。
 * 事件 ID 是不透明字符串；形如数字或字面量的响应体按原文使用，避免 JSON 数值改写（精度、1e3、42.0）。
 */
export function parseEventIdentifier(body: string): string | undefined {
  const trimmed = body.trim();
  const parsed = parseJson(trimmed);

  let eventId: string | undefined;
  if (typeof parsed === 'string') {
    eventId = parsed;
  } else if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
    const candidate: unknown = Reflect.get(parsed, 'event_id') ?? Reflect.get(parsed, 'eventId');
    if (typeof candidate === 'string' || typeof candidate === 'number') {
      eventId = String(candidate);
    }
  } else if (parsed === undefined || typeof parsed === 'number' || typeof parsed === 'boolean') {
    eventId = trimmed;
  }

  const normalized = eventId?.trim();
  return normalized && isValidEventId(normalized) ? normalized : undefined;
}

export interface PersistedEventWriter {
  persistEventId(eventId: string): Promise<void>;
}

interface EventTrackerOptions {
  client: ClusterApiClient;
  store: EventStateStore;
}

/**
 * Event Tracker
 *
 * 远端：每次运行从集群取一次当前事件 ID，失败即致命，不重试。
 * 本地：读写上次配置成功时的事件 ID。
 */
export class EventTracker implements PersistedEventWriter {
  private readonly logger = getLoggerFor(this);
  private readonly client: ClusterApiClient;
  private readonly store: EventStateStore;

  public constructor(options: EventTrackerOptions) {
    this.client = options.client;
    this.store = options.store;
  }

  public async fetchRemoteEventId(endpoint: string): Promise<string> {
    const body = await this.client.getEventId(endpoint);
    const eventId = parseEventIdentifier(body);
    if (!eventId) {
      throw new RemoteQueryError(`Cluster ${endpoint} returned no usable event ID`);
    }
    this.logger.info(`Received event ID: ${eventId}`);
    return eventId;
  }

  public async readPersistedEventId(): Promise<string | undefined> {
    return this.store.read();
  }

  public async persistEventId(eventId: string): Promise<void> {
    await this.store.write(eventId);
  }
}
