import { createLogger, describeError } from '@trialgrid/core';

import { poll } from '../health-poller.js';
import { interfaceWithAddress } from '../readiness.js';
import { clientNamespace, type Phase } from './context.js';

const log = createLogger('phase.namespaces');

/**
 * NamespacesReady: the bridge interface must exist, then one network namespace per client is
 * created (stale ones are reclaimed) and the route to the client subnet is installed.
 */
export function namespacesReadyPhase(): Phase {
  return {
    name: 'NamespacesReady',
    async start(ctx) {
      const { network, clients, polling } = ctx.config;

      await poll(interfaceWithAddress(ctx.host.network, network.bridgeAddress), {
        intervalMs: polling.logIntervalMs,
        timeoutMs: network.bridgeTimeoutMs,
        signal: ctx.signal,
      });

      for (let i = 1; i <= clients.count; i++) {
        const name = clientNamespace(ctx.config, i);
        await ctx.guard.acquireWithReclaim('namespace', name, ctx.owner, { signal: ctx.signal });
        await ctx.host.network.addNamespace(name);
        ctx.state.namespaces.push(name);
        log.info({ namespace: name }, 'namespace created');
      }

      const { destination, via } = network.route;
      try {
        if (!(await ctx.host.network.hasRoute(destination, via))) {
          await ctx.host.network.addRoute(destination, via);
          log.info({ destination, via }, 'route added');
        }
      } catch (err) {
        log.warn({ destination, via, err: describeError(err) }, 'failed to add route');
      }
    },
    readiness(ctx) {
      const expected = [...ctx.state.namespaces];
      return {
        predicate: {
          describe: `namespaces ${expected.join(', ')} to exist`,
          async check() {
            const present = await ctx.host.network.listNamespaces();
            return expected.every((name) => present.includes(name));
          },
          async diagnostics() {
            const present = await ctx.host.network.listNamespaces();
            return `present namespaces: ${present.join(', ') || '(none)'}`;
          },
        },
        timeoutMs: ctx.config.network.bridgeTimeoutMs,
        intervalMs: ctx.config.polling.logIntervalMs,
      };
    },
  };
}
