import type { FastifyInstance } from 'fastify';
import {
  decodeCreateRequest,
  decodeDeleteRequest,
  decodeModifyRequest,
  decodeSearchRequest,
  encodeSearchResponse,
} from 'idm-proto';
import type { RouteContext } from '../operation.js';
import { unwrap } from '../operation.js';
import { requireToken } from '../../api/middleware/authenticate.js';
import { sendWire } from '../../api/reply.js';
import { search } from './search.js';
import { create } from './create.js';
import { deleteEntries } from './delete.js';
import { modify } from './modify.js';

export async function registerEntryRoutes(app: FastifyInstance, ctx: RouteContext): Promise<void> {
  const { operations, negotiator } = ctx;

  // POST /search: entries matching a filter
  app.post('/search', async (request, reply) => {
    const token = requireToken(request, negotiator);
    const req = unwrap(decodeSearchRequest(request.body, operations.filterLimits));
    const res = unwrap(await search(operations, token, req));
    request.log.debug({ principal: token.name, count: res.entries.length }, 'search');
    return sendWire(reply, 200, encodeSearchResponse(res));
  });

  // POST /create: add entries
  app.post('/create', async (request, reply) => {
    const token = requireToken(request, negotiator);
    const req = unwrap(decodeCreateRequest(request.body));
    unwrap(await create(operations, token, req));
    request.log.info({ principal: token.name, count: req.entries.length }, 'entries created');
    return sendWire(reply, 200, {});
  });

  // POST /delete: move matching entries to the recycle bin
  app.post('/delete', async (request, reply) => {
    const token = requireToken(request, negotiator);
    const req = unwrap(decodeDeleteRequest(request.body, operations.filterLimits));
    unwrap(await deleteEntries(operations, token, req));
    request.log.info({ principal: token.name }, 'entries deleted');
    return sendWire(reply, 200, {});
  });

  // POST /modify: apply a modify list to matching entries
  app.post('/modify', async (request, reply) => {
    const token = requireToken(request, negotiator);
    const req = unwrap(decodeModifyRequest(request.body, operations.filterLimits));
    unwrap(await modify(operations, token, req));
    request.log.info({ principal: token.name, mods: req.modlist.mods.length }, 'entries modified');
    return sendWire(reply, 200, {});
  });
}
