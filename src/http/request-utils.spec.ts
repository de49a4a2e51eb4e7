import { IncomingMessage } from 'http';
import { Socket } from 'net';
import { clientAddress, queryInt } from './request-utils';

function createRequest(remoteAddress: string, forwardedFor?: string): IncomingMessage {
  const socket = new Socket();
  Object.defineProperty(socket, 'remoteAddress', { value: remoteAddress });
  const req = new IncomingMessage(socket);
  if (forwardedFor !== undefined) {
    req.headers['x-forwarded-for'] = forwardedFor;
  }
  return req;
}

describe('request utils', () => {
  describe('clientAddress', () => {
    it('should ignore X-Forwarded-For from an untrusted peer', () => {
      const req = createRequest('203.0.113.9', '198.51.100.1');

      expect(clientAddress(req)).toBe('203.0.113.9');
      expect(clientAddress(req, ['10.0.0.1'])).toBe('203.0.113.9');
    });

    it('should strip the IPv4-mapped prefix', () => {
      expect(clientAddress(createRequest('::ffff:127.0.0.1'))).toBe('127.0.0.1');
    });

    it('should take the nearest untrusted hop behind a trusted proxy', () => {
      const req = createRequest('10.0.0.1', '1.2.3.4, 198.51.100.7, 10.0.0.2');

      expect(clientAddress(req, ['10.0.0.1', '10.0.0.2'])).toBe('198.51.100.7');
    });

    it('should fall back to the peer when a trusted proxy sends no header', () => {
      expect(clientAddress(createRequest('10.0.0.1'), ['10.0.0.1'])).toBe('10.0.0.1');
    });
  });

  describe('queryInt', () => {
    it('should read positive integers only', () => {
      const params = new URLSearchParams('page=3&perPage=-1&size=abc');

      expect(queryInt(params, 'page')).toBe(3);
      expect(queryInt(params, 'perPage')).toBeUndefined();
      expect(queryInt(params, 'size')).toBeUndefined();
      expect(queryInt(params, 'missing')).toBeUndefined();
    });
  });
});
