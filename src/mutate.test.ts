import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { mutatePod } from './mutate.js';
import type { MutationOutcome } from './mutate.js';
import { createLogger } from './logger.js';
import type { LogRecord } from './logger.js';
import { renderHelperConfig } from './helper-config.js';
import { renderProxyBootstrap } from './proxy-config.js';
import { applyPatch, marshal } from './patch.js';
import { DEFAULT_INJECTOR_OPTIONS } from './types.js';
import type { Pod } from './types.js';

const silent = createLogger({}, { sink: () => {} });
const opts = { options: DEFAULT_INJECTOR_OPTIONS, logger: silent, requestUid: 'req-1' };

const SOCKET_MOUNT = { name: 'spiffe-workload-api', mountPath: '/spiffe-workload-api', readOnly: true };
const SOCKET_ENV = { name: 'SPIFFE_ENDPOINT_SOCKET', value: 'unix:///spiffe-workload-api/spire-agent.sock' };

function makePod(annotations?: Record<string, string>, spec: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    apiVersion: 'v1',
    kind: 'Pod',
    metadata: { name: 'app', namespace: 'default', ...(annotations && { annotations }) },
    spec: { containers: [{ name: 'app', image: 'app:1' }], ...spec },
  };
}

function enabled(extra: Record<string, string> = {}): Record<string, string> {
  return { 'workload-identity.io/enabled': 'true', ...extra };
}

function patched(outcome: MutationOutcome): Extract<MutationOutcome, { kind: 'patched' }> {
  assert.equal(outcome.kind, 'patched', JSON.stringify(outcome));
  if (outcome.kind !== 'patched') throw new Error('unreachable');
  return outcome;
}

function names(items: readonly { name: string }[] | undefined): string[] {
  return (items ?? []).map((item) => item.name);
}

describe('mutatePod gate', () => {
  it('allows pods without the enabled annotation unchanged', () => {
    assert.deepEqual(mutatePod(makePod(), opts), { kind: 'allowed', reason: 'Injection criteria not met' });
  });

  it('ignores mode and debug annotations when not enabled', () => {
    const pod = makePod({
      'workload-identity.io/enabled': 'True',
      'workload-identity.io/mode': 'bogus',
      'workload-identity.io/debug': 'true',
    });
    assert.deepEqual(mutatePod(pod, opts), { kind: 'allowed', reason: 'Injection criteria not met' });
  });
});

describe('mutatePod injection', () => {
  it('gives every container the identity socket when enabled without a mode', () => {
    const { patch, pod } = patched(mutatePod(makePod(enabled()), opts));
    assert.deepEqual(pod.spec.volumes, [
      { name: 'spiffe-workload-api', csi: { driver: 'csi.spiffe.io', readOnly: true } },
    ]);
    assert.deepEqual(pod.spec.containers, [
      { name: 'app', image: 'app:1', volumeMounts: [SOCKET_MOUNT], env: [SOCKET_ENV] },
    ]);
    assert.equal(pod.spec.initContainers, undefined);
    assert.deepEqual(patch, [
      { op: 'add', path: '/spec/containers/0/volumeMounts', value: [SOCKET_MOUNT] },
      { op: 'add', path: '/spec/containers/0/env', value: [SOCKET_ENV] },
      {
        op: 'add',
        path: '/spec/volumes',
        value: [{ name: 'spiffe-workload-api', csi: { driver: 'csi.spiffe.io', readOnly: true } }],
      },
    ]);
  });

  it('adds the helper init container first, its sidecar last, and its volumes', () => {
    const original = makePod(enabled({ 'workload-identity.io/mode': 'helper' }), {
      initContainers: [{ name: 'user-init', image: 'busybox' }],
    });
    const { pod } = patched(mutatePod(original, opts));
    assert.deepEqual(names(pod.spec.initContainers), ['inject-spiffe-helper-config', 'user-init']);
    assert.deepEqual(names(pod.spec.containers), ['app', 'spiffe-helper']);
    assert.deepEqual(names(pod.spec.volumes), ['spiffe-workload-api', 'spiffe-helper-config', 'workload-identity-certs']);

    const init = pod.spec.initContainers?.[0];
    assert.deepEqual(init?.env, [
      {
        name: 'SPIFFE_HELPER_CONFIG',
        value: renderHelperConfig({ agentAddress: '/spiffe-workload-api/spire-agent.sock', certDir: '/workload-identity' }),
      },
    ]);
    assert.deepEqual(init?.args, [
      `mkdir -p /etc/spiffe-helper && printf '%s' "\${SPIFFE_HELPER_CONFIG}" > /etc/spiffe-helper/config.conf`,
    ]);
    assert.equal(init?.image, DEFAULT_INJECTOR_OPTIONS.initImage);

    const sidecar = pod.spec.containers[1];
    assert.equal(sidecar.image, DEFAULT_INJECTOR_OPTIONS.helperImage);
    assert.deepEqual(sidecar.args, ['-config', '/etc/spiffe-helper/config.conf']);
    assert.deepEqual(sidecar.env, [SOCKET_ENV]);
    assert.deepEqual(sidecar.volumeMounts, [
      { name: 'spiffe-helper-config', mountPath: '/etc/spiffe-helper', readOnly: true },
      { name: 'workload-identity-certs', mountPath: '/workload-identity' },
      SOCKET_MOUNT,
    ]);
    assert.deepEqual(sidecar.readinessProbe?.httpGet, { path: '/ready', port: 8081, scheme: 'HTTP' });
  });

  it('renders the intermediate bundle setting when annotated', () => {
    const original = makePod(
      enabled({
        'workload-identity.io/mode': 'helper',
        'workload-identity.io/helper-include-intermediate-bundle': 'true',
      })
    );
    const { pod } = patched(mutatePod(original, opts));
    const config = pod.spec.initContainers?.[0].env?.[0].value ?? '';
    assert.ok(config.split('\n').includes('add_intermediates_to_bundle = true'));
  });

  it('adds the proxy init container, sidecar and bootstrap', () => {
    const options = { ...DEFAULT_INJECTOR_OPTIONS, agentXdsService: 'agent.test.svc', agentXdsPort: 19001 };
    const original = makePod(enabled({ 'workload-identity.io/mode': 'proxy' }));
    const { pod } = patched(mutatePod(original, { ...opts, options }));
    assert.deepEqual(names(pod.spec.initContainers), ['inject-envoy-config']);
    assert.deepEqual(names(pod.spec.containers), ['app', 'envoy-sidecar']);
    assert.deepEqual(names(pod.spec.volumes), ['spiffe-workload-api', 'envoy-config']);

    const init = pod.spec.initContainers?.[0];
    assert.deepEqual(init?.env, [
      { name: 'ENVOY_CONFIG_CONTENT', value: renderProxyBootstrap({ xdsService: 'agent.test.svc', xdsPort: 19001 }) },
    ]);
    assert.deepEqual(init?.securityContext?.capabilities, { add: ['NET_ADMIN', 'NET_RAW'] });
    assert.ok(init?.args?.[0].startsWith('set -e\nmkdir -p /etc/envoy && printf'));

    const sidecar = pod.spec.containers[1];
    assert.equal(sidecar.securityContext?.runAsUser, 1337);
    assert.deepEqual(sidecar.args, ['-c', '/etc/envoy/envoy.json']);
    assert.deepEqual(sidecar.ports, [{ containerPort: 10000 }]);
  });

  it('keeps the helper init container at index 0 in either mode order', () => {
    for (const mode of ['helper,proxy', 'proxy,helper', 'proxy, helper, proxy']) {
      const original = makePod(enabled({ 'workload-identity.io/mode': mode }), {
        initContainers: [{ name: 'user-init' }],
      });
      const { pod } = patched(mutatePod(original, opts));
      assert.deepEqual(
        names(pod.spec.initContainers),
        ['inject-spiffe-helper-config', 'inject-envoy-config', 'user-init'],
        mode
      );
    }
  });

  it('adds the debug UI sidecar with socket access', () => {
    const original = makePod(enabled({ 'workload-identity.io/debug': 'true' }));
    const { pod } = patched(mutatePod(original, opts));
    assert.deepEqual(pod.spec.containers[1], {
      name: 'workload-identity-debug-ui',
      image: DEFAULT_INJECTOR_OPTIONS.debugUiImage,
      imagePullPolicy: 'Always',
      ports: [{ containerPort: 8000 }],
      env: [SOCKET_ENV],
      volumeMounts: [SOCKET_MOUNT],
    });
  });
});

describe('mutatePod with existing resources', () => {
  it('corrects the read-only flag of an existing socket mount', () => {
    const original = makePod(enabled(), {
      containers: [{ name: 'app', volumeMounts: [{ ...SOCKET_MOUNT, readOnly: false }] }],
    });
    const { pod, patch } = patched(mutatePod(original, opts));
    assert.deepEqual(pod.spec.containers[0].volumeMounts, [SOCKET_MOUNT]);
    assert.ok(patch.some((op) => op.op === 'replace' && op.path === '/spec/containers/0/volumeMounts/0/readOnly'));
  });

  it('keeps a user-defined socket variable and a mount at another path', () => {
    const records: LogRecord[] = [];
    const logger = createLogger({}, { sink: (record) => records.push(record) });
    const original = makePod(enabled(), {
      containers: [
        {
          name: 'app',
          env: [{ name: 'SPIFFE_ENDPOINT_SOCKET', value: 'unix:///custom.sock' }],
          volumeMounts: [{ name: 'spiffe-workload-api', mountPath: '/custom' }],
        },
      ],
    });
    const { pod } = patched(mutatePod(original, { ...opts, logger }));
    assert.deepEqual(pod.spec.containers[0].env, [{ name: 'SPIFFE_ENDPOINT_SOCKET', value: 'unix:///custom.sock' }]);
    assert.deepEqual(pod.spec.containers[0].volumeMounts, [{ name: 'spiffe-workload-api', mountPath: '/custom' }]);

    const warning = records.find((r) => r.level === 'warn');
    assert.equal(warning?.message, 'Container mounts the volume at another path; leaving it');
    assert.equal(warning?.containerName, 'app');
    assert.equal(warning?.expectedMountPath, '/spiffe-workload-api');
    assert.equal(warning?.podName, 'app');
    assert.equal(warning?.request, 'req-1');
  });

  it('does not duplicate a user volume that already has the socket volume name', () => {
    const original = makePod(enabled(), { volumes: [{ name: 'spiffe-workload-api', emptyDir: {} }] });
    const { pod } = patched(mutatePod(original, opts));
    assert.deepEqual(pod.spec.volumes, [{ name: 'spiffe-workload-api', emptyDir: {} }]);
  });

  it('never modifies the received object', () => {
    const original = makePod(enabled({ 'workload-identity.io/mode': 'helper,proxy' }));
    const before = structuredClone(original);
    mutatePod(original, opts);
    assert.deepEqual(original, before);
  });
});

describe('mutatePod idempotence', () => {
  const modes = ['', 'helper', 'proxy', 'helper,proxy', 'proxy,helper'];
  for (const mode of modes) {
    for (const debug of [false, true]) {
      it(`is a no-op on its own output (mode "${mode}", debug ${debug})`, () => {
        const annotations = enabled({
          ...(mode ? { 'workload-identity.io/mode': mode } : {}),
          ...(debug ? { 'workload-identity.io/debug': 'true' } : {}),
        });
        const original = makePod(annotations, { initContainers: [{ name: 'user-init' }] });
        const first = patched(mutatePod(original, opts));

        const admitted = applyPatch(original, first.patch);
        assert.deepEqual(admitted, marshal(first.pod));

        const second = patched(mutatePod(admitted, opts));
        assert.deepEqual(second.patch, []);

        for (const list of [second.pod.spec.containers, second.pod.spec.initContainers, second.pod.spec.volumes]) {
          const listed = names(list);
          assert.equal(new Set(listed).size, listed.length, `duplicate names in ${listed.join(',')}`);
        }
        for (const container of second.pod.spec.containers) {
          assert.deepEqual(
            container.volumeMounts?.filter((m) => m.name === 'spiffe-workload-api'),
            [SOCKET_MOUNT],
            container.name
          );
        }
      });
    }
  }
});

describe('mutatePod mode lists', () => {
  it('treats a repeated mode like a single one', () => {
    const once = patched(mutatePod(makePod(enabled({ 'workload-identity.io/mode': 'helper' })), opts));
    const twice = patched(mutatePod(makePod(enabled({ 'workload-identity.io/mode': 'helper,helper' })), opts));
    assert.deepEqual(twice.patch, once.patch);
    assert.deepEqual(names(twice.pod.spec.containers), ['app', 'spiffe-helper']);
  });
});

describe('mutatePod failures', () => {
  it('denies unknown modes without mutating', () => {
    const outcome = mutatePod(makePod(enabled({ 'workload-identity.io/mode': 'helper,bogus' })), opts);
    assert.deepEqual(outcome, {
      kind: 'denied',
      reason:
        'invalid value "helper,bogus" for annotation "workload-identity.io/mode": ' +
        'unrecognized mode(s) "bogus"; allowed values are "helper", "proxy"',
    });
  });

  it('reports undecodable objects as 400', () => {
    assert.deepEqual(mutatePod({ metadata: {} }, opts), {
      kind: 'errored',
      code: 400,
      message: 'Invalid Pod: missing spec',
    });
    assert.deepEqual(mutatePod(undefined, opts), {
      kind: 'errored',
      code: 400,
      message: 'object must be a JSON object',
    });
  });

  it('reports render failures as 500', () => {
    const options = { ...DEFAULT_INJECTOR_OPTIONS, agentXdsPort: 0 };
    const outcome = mutatePod(makePod(enabled({ 'workload-identity.io/mode': 'proxy' })), { ...opts, options });
    assert.deepEqual(outcome, {
      kind: 'errored',
      code: 500,
      message: 'xdsPort must be an integer between 1 and 65535, got 0',
    });
  });
});

describe('mutatePod result', () => {
  it('returns the mutated pod typed', () => {
    const { pod }: { pod: Pod } = patched(mutatePod(makePod(enabled()), opts));
    assert.equal(pod.metadata.name, 'app');
  });
});
