import { log } from '../log';
import { setActiveConnections } from '../metrics';

export const REPLACED_CLOSE_CODE = 4000;
export const REPLACED_CLOSE_REASON = 'replaced_by_new_connection';

export interface HubConnection {
  readonly deviceId: string;
  close(code: number, reason: string): void;
}

/**
 * Registry of live device connections, at most one per device. Mutations run
 * synchronously so a register/unregister pair can never interleave.
 */
export class ConnectionHub<T extends HubConnection = HubConnection> {
  private readonly connections = new Map<string, T>();

  /** Admits `connection`, closing any connection it replaces. */
  public register(connection: T): T | undefined {
    const previous = this.connections.get(connection.deviceId);
    this.connections.set(connection.deviceId, connection);
    setActiveConnections(this.connections.size);

    if (previous && previous !== connection) {
      log.info(
        { event: 'device_connection_replaced', device_id: connection.deviceId },
        'device connection replaced',
      );
      previous.close(REPLACED_CLOSE_CODE, REPLACED_CLOSE_REASON);
      return previous;
    }

    log.info({ event: 'device_registered', device_id: connection.deviceId }, 'device registered');
    return undefined;
  }

  /** Removes `connection` only if it is still the registered one for its device. */
  public unregister(connection: T): boolean {
    if (this.connections.get(connection.deviceId) !== connection) {
      return false;
    }

    this.connections.delete(connection.deviceId);
    setActiveConnections(this.connections.size);
    log.info({ event: 'device_unregistered', device_id: connection.deviceId }, 'device unregistered');
    return true;
  }

  public get(deviceId: string): T | undefined {
    return this.connections.get(deviceId);
  }

  public has(deviceId: string): boolean {
    return this.connections.has(deviceId);
  }

  public size(): number {
    return this.connections.size;
  }

  public closeAll(code: number, reason: string): void {
    for (const connection of [...this.connections.values()]) {
      connection.close(code, reason);
    }
    this.connections.clear();
    setActiveConnections(0);
  }
}
