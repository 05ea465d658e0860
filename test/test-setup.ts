import 'reflect-metadata';
import nock from 'nock';
import sinon from 'sinon';

process.env.TEST = '1';

exports.mochaHooks = {
  beforeEach(done: () => void) {
    nock.disableNetConnect();
    done();
  },

  afterEach(done: () => void) {
    sinon.restore();
    nock.cleanAll();
    nock.enableNetConnect();
    done();
  },
};
