import { expect } from 'chai';
import ServiceTable from '../src/base-table';

describe('service table', () => {
  it('holds one row per service', () => {
    const table = new ServiceTable({ style: { head: [], border: [] } });
    table.addService('traefik', 'running', 'required');
    table.addService('client-ui-nginx', 'not running', 'optional');

    expect(table.length).to.eq(2);
    expect(table[1]).to.deep.equal(['client-ui-nginx', 'not running', 'optional']);
    expect(table.toString()).to.contain('client-ui-nginx');
  });
});
