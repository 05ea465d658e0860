import Table from 'cli-table3';

export type ServiceState = 'running' | 'not running';

/**
 * Service state table printed by `status`.
 */
export default class ServiceTable extends Table {
  constructor(opts: Table.TableConstructorOptions = {}) {
    super({ head: ['Service', 'State', 'Expected'], style: { head: ['green'] }, ...opts });
  }

  addService(service: string, state: ServiceState, expected: 'required' | 'optional'): void {
    this.push([service, state, expected]);
  }
}
