import type { FastifyReply } from 'fastify';
import type { WireValue } from 'idm-proto';

/**
 * Sends a wire value as JSON. Serialized here so that bare strings (unit
 * variants) still go out as JSON rather than text.
 */
export function sendWire(reply: FastifyReply, status: number, value: WireValue): FastifyReply {
  return reply.status(status).type('application/json; charset=utf-8').send(JSON.stringify(value));
}
