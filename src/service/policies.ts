// Per-operation validation order.
//
// Some operations check identifiers before the version (an absent
// identifier is the more specific error), others only after it. The table
// below is the single source of that ordering.

import { inspectNodeId, inspectVolumeId, readName } from '../protocol/messages.js';
import type { ProtocolMethodName } from '../protocol/methods.js';
import {
  controllerPublishVolumeErrorReply,
  controllerUnpublishVolumeErrorReply,
  createVolumeErrorReply,
  deleteVolumeErrorReply,
  generalErrorReply,
} from '../protocol/replies.js';
import type { ErrorReply } from '../protocol/replies.js';

/** Returns a domain-error reply when the request fails the check. */
export type RequestCheck = (request: object) => ErrorReply | undefined;

export interface MethodPolicy {
  beforeVersion: readonly RequestCheck[];
  afterVersion: readonly RequestCheck[];
}

type VolumeIdReason = 'missing id obj' | 'missing id map';

function volumeIdCheck(reply: (reason: VolumeIdReason) => ErrorReply): RequestCheck {
  return (request) => {
    const volumeId = inspectVolumeId(request);
    if (volumeId.status === 'missing') return reply('missing id obj');
    if (volumeId.status === 'empty') return reply('missing id map');
    return undefined;
  };
}

function nodeIdCheck(reply: (reason: string) => ErrorReply): RequestCheck {
  return (request) =>
    inspectNodeId(request).status === 'present' ? undefined : reply('missing node id');
}

const nameCheck: RequestCheck = (request) =>
  readName(request) === '' ? createVolumeErrorReply('INVALID_VOLUME_NAME', 'missing name') : undefined;

const NO_CHECKS: MethodPolicy = { beforeVersion: [], afterVersion: [] };

const POLICIES: Partial<Record<ProtocolMethodName, MethodPolicy>> = {
  CreateVolume: { beforeVersion: [], afterVersion: [nameCheck] },
  DeleteVolume: {
    beforeVersion: [volumeIdCheck((reason) => deleteVolumeErrorReply('INVALID_VOLUME_ID', reason))],
    afterVersion: [],
  },
  ControllerPublishVolume: {
    beforeVersion: [
      volumeIdCheck((reason) => controllerPublishVolumeErrorReply('INVALID_VOLUME_ID', reason)),
    ],
    afterVersion: [
      nodeIdCheck((reason) => controllerPublishVolumeErrorReply('INVALID_NODE_ID', reason)),
    ],
  },
  ControllerUnpublishVolume: {
    beforeVersion: [
      volumeIdCheck((reason) => controllerUnpublishVolumeErrorReply('INVALID_VOLUME_ID', reason)),
    ],
    afterVersion: [
      nodeIdCheck((reason) => controllerUnpublishVolumeErrorReply('INVALID_NODE_ID', reason)),
    ],
  },
  NodePublishVolume: {
    beforeVersion: [volumeIdCheck((reason) => generalErrorReply('MISSING_REQUIRED_FIELD', reason))],
    afterVersion: [],
  },
  NodeUnpublishVolume: {
    beforeVersion: [volumeIdCheck((reason) => generalErrorReply('MISSING_REQUIRED_FIELD', reason))],
    afterVersion: [],
  },
};

export function policyFor(method: ProtocolMethodName): MethodPolicy {
  return POLICIES[method] ?? NO_CHECKS;
}

/** First failing check's reply, if any. */
export function runChecks(checks: readonly RequestCheck[], request: object): ErrorReply | undefined {
  for (const check of checks) {
    const reply = check(request);
    if (reply) return reply;
  }
  return undefined;
}
