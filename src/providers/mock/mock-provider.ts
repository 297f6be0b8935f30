// Mock storage provider: an in-memory volume catalogue speaking the full
// protocol. Used as the built-in provider and in the test suite.

import { z } from 'zod';

import {
  controllerPublishVolumeErrorReply,
  controllerUnpublishVolumeErrorReply,
  createVolumeErrorReply,
  deleteVolumeErrorReply,
  generalErrorReply,
  nodePublishVolumeErrorReply,
  nodeUnpublishVolumeErrorReply,
  resultReply,
  validateVolumeCapabilitiesErrorReply,
} from '../../protocol/index.js';
import { BaseProvider } from '../base-provider.js';
import {
  DEFAULT_VOLUME_BYTES,
  TOTAL_CAPACITY_BYTES,
  VolumeCatalogue,
  snapshot,
} from './catalogue.js';

export const MOCK_PROVIDER_NAME = 'mock';
export const MOCK_VENDOR_VERSION = '0.1.0';
export const MOCK_NODE_ID = 'mock';
export const MOCK_SEED_VOLUMES = ['Mock Volume 1', 'Mock Volume 2', 'Mock Volume 3'] as const;

/** Metadata key recording where a volume is mounted on this node. */
export const MOUNT_PATH_KEY = `${MOCK_NODE_ID}.mntpath`;

const MAX_TOKEN = 0xffffffff;

const ValuesSchema = z.object({ values: z.record(z.string(), z.string()).nullish() }).nullish();

// decoded requests carry uint64 as a decimal string; direct callers may pass a number
const ByteCountSchema = z.union([
  z.string().regex(/^\d+$/),
  z.number().int().nonnegative(),
]);

const CreateVolumeSchema = z.object({
  name: z.string().nullish(),
  capacityRange: z.object({ requiredBytes: ByteCountSchema.nullish() }).nullish(),
});

const VolumeRequestSchema = z.object({
  volumeId: ValuesSchema,
  nodeId: ValuesSchema,
  targetPath: z.string().nullish(),
});

const ValidateCapabilitiesSchema = z.object({
  volumeInfo: z.object({ id: ValuesSchema }).nullish(),
  volumeCapabilities: z
    .array(
      z.object({
        block: z.object({}).nullish(),
        mount: z.object({ fsType: z.string().nullish() }).nullish(),
      })
    )
    .nullish(),
});

const ListVolumesSchema = z.object({
  maxEntries: z.number().int().min(0).nullish(),
  startingToken: z.string().nullish(),
});

type IdLookup =
  | { ok: true; id: string }
  | { ok: false; reason: 'missing id obj' | 'missing id map' | 'missing id val' };

/** Same three-step check the wrapper runs, plus the provider's own "id" key. */
function lookupId(identifier: z.infer<typeof ValuesSchema>): IdLookup {
  if (!identifier) return { ok: false, reason: 'missing id obj' };
  const values = identifier.values ?? {};
  if (Object.keys(values).length === 0) return { ok: false, reason: 'missing id map' };
  const id = values.id;
  if (id === undefined) return { ok: false, reason: 'missing id val' };
  return { ok: true, id };
}

export class MockProvider extends BaseProvider {
  private readonly catalogue: VolumeCatalogue;

  constructor(name: string = MOCK_PROVIDER_NAME) {
    super(name);
    this.catalogue = new VolumeCatalogue(MOCK_SEED_VOLUMES);
  }

  // -------------------------------------------------------------------------
  // Identity
  // -------------------------------------------------------------------------

  async GetSupportedVersions(): Promise<object> {
    return resultReply({ supportedVersions: [{ major: 0, minor: 1, patch: 0 }] });
  }

  async GetPluginInfo(): Promise<object> {
    return resultReply({ name: this.name, vendorVersion: MOCK_VENDOR_VERSION, manifest: {} });
  }

  // -------------------------------------------------------------------------
  // Controller
  // -------------------------------------------------------------------------

  async CreateVolume(request: object): Promise<object> {
    const { name, capacityRange } = CreateVolumeSchema.parse(request);
    if (!name) {
      return createVolumeErrorReply('INVALID_VOLUME_NAME', 'missing name');
    }

    // idempotent: an existing volume of that name is returned as-is
    let volume = this.catalogue.find('name', name);
    if (!volume) {
      const requested = BigInt(capacityRange?.requiredBytes ?? 0);
      volume = this.catalogue.create(
        name,
        requested > 0n ? requested.toString() : DEFAULT_VOLUME_BYTES
      );
      this.logger.debug({ volume: volume.id.values }, 'Created volume');
    }

    return resultReply({ volumeInfo: snapshot(volume) });
  }

  async DeleteVolume(request: object): Promise<object> {
    const lookup = lookupId(VolumeRequestSchema.parse(request).volumeId);
    if (!lookup.ok) {
      return deleteVolumeErrorReply('INVALID_VOLUME_ID', lookup.reason);
    }

    const volume = this.catalogue.find('id', lookup.id);
    if (volume) {
      this.catalogue.remove(volume);
      this.logger.debug({ volume: lookup.id }, 'Deleted volume');
    }
    return resultReply({});
  }

  async ControllerPublishVolume(request: object): Promise<object> {
    const parsed = VolumeRequestSchema.parse(request);
    const lookup = lookupId(parsed.volumeId);
    if (!lookup.ok) {
      return controllerPublishVolumeErrorReply('INVALID_VOLUME_ID', lookup.reason);
    }

    const node = lookupId(parsed.nodeId);
    if (!node.ok) {
      const reason = node.reason === 'missing id val' ? 'node id required' : 'missing node id';
      return controllerPublishVolumeErrorReply('INVALID_NODE_ID', reason);
    }

    const volume = this.catalogue.find('id', lookup.id);
    if (!volume) {
      return controllerPublishVolumeErrorReply('VOLUME_DOES_NOT_EXIST', 'missing volume');
    }

    // republishing to the same node hands back the existing device path
    const attachKey = `devpath.${node.id}`;
    let devpath = volume.metadata.values[attachKey];
    if (devpath === undefined) {
      devpath = String(Math.floor(Date.now() / 1000));
      volume.metadata.values[attachKey] = devpath;
    }

    return resultReply({ publishVolumeInfo: { values: { devpath } } });
  }

  async ControllerUnpublishVolume(request: object): Promise<object> {
    const parsed = VolumeRequestSchema.parse(request);
    const lookup = lookupId(parsed.volumeId);
    if (!lookup.ok) {
      return controllerUnpublishVolumeErrorReply('INVALID_VOLUME_ID', lookup.reason);
    }

    const node = lookupId(parsed.nodeId);
    if (!node.ok) {
      return node.reason === 'missing id val'
        ? controllerUnpublishVolumeErrorReply('NODE_ID_REQUIRED', 'node id required')
        : controllerUnpublishVolumeErrorReply('INVALID_NODE_ID', 'missing node id');
    }

    const volume = this.catalogue.find('id', lookup.id);
    if (!volume) {
      return controllerUnpublishVolumeErrorReply('VOLUME_DOES_NOT_EXIST', 'missing volume');
    }

    const attachKey = `devpath.${node.id}`;
    if (volume.metadata.values[attachKey] === undefined) {
      return controllerUnpublishVolumeErrorReply(
        'VOLUME_NOT_ATTACHED_TO_SPECIFIED_NODE',
        'not attached'
      );
    }
    delete volume.metadata.values[attachKey];

    return resultReply({});
  }

  async ValidateVolumeCapabilities(request: object): Promise<object> {
    const { volumeInfo, volumeCapabilities } = ValidateCapabilitiesSchema.parse(request);
    const lookup = lookupId(volumeInfo?.id);
    if (!lookup.ok) {
      return validateVolumeCapabilitiesErrorReply('INVALID_VOLUME_INFO', lookup.reason);
    }
    if (!this.catalogue.find('id', lookup.id)) {
      return validateVolumeCapabilitiesErrorReply('VOLUME_DOES_NOT_EXIST', 'missing volume');
    }

    const unsupported = (volumeCapabilities ?? []).find((capability) => {
      const fsType = capability.mount?.fsType;
      return fsType !== undefined && fsType !== null && fsType !== '' && fsType !== 'ext4';
    });
    if (unsupported) {
      return resultReply({
        supported: false,
        message: `unsupported fs type: ${unsupported.mount?.fsType ?? ''}`,
      });
    }
    return resultReply({ supported: true, message: '' });
  }

  async ListVolumes(request: object): Promise<object> {
    const { maxEntries, startingToken } = ListVolumesSchema.parse(request);
    const total = this.catalogue.size;

    let start = 0;
    if (startingToken) {
      const parsed = /^\d+$/.test(startingToken) ? Number(startingToken) : Number.NaN;
      if (!Number.isSafeInteger(parsed) || parsed > MAX_TOKEN) {
        return generalErrorReply('UNKNOWN', `invalid starting token: ${startingToken}`);
      }
      start = parsed;
    }
    if (start > total) {
      return generalErrorReply('UNKNOWN', `starting token ${start} exceeds volume count ${total}`);
    }

    const limit = maxEntries ?? 0;
    const page = this.catalogue.slice(start, limit > 0 ? start + limit : undefined);
    const end = start + page.length;

    return resultReply({
      entries: page.map((volume) => ({ volumeInfo: snapshot(volume) })),
      nextToken: end < total ? String(end) : '',
    });
  }

  async GetCapacity(): Promise<object> {
    return resultReply({ totalCapacity: TOTAL_CAPACITY_BYTES });
  }

  async ControllerGetCapabilities(): Promise<object> {
    const rpcs = ['CREATE_DELETE_VOLUME', 'PUBLISH_UNPUBLISH_VOLUME', 'LIST_VOLUMES', 'GET_CAPACITY'];
    return resultReply({ capabilities: rpcs.map((type) => ({ rpc: { type } })) });
  }

  // -------------------------------------------------------------------------
  // Node
  // -------------------------------------------------------------------------

  async NodePublishVolume(request: object): Promise<object> {
    const parsed = VolumeRequestSchema.parse(request);
    const lookup = lookupId(parsed.volumeId);
    if (!lookup.ok) {
      return generalErrorReply('MISSING_REQUIRED_FIELD', lookup.reason);
    }

    const volume = this.catalogue.find('id', lookup.id);
    if (!volume) {
      return nodePublishVolumeErrorReply('VOLUME_DOES_NOT_EXIST', 'missing volume');
    }

    const targetPath = parsed.targetPath ?? '';
    if (targetPath === '') {
      return nodePublishVolumeErrorReply('UNSUPPORTED_MOUNT_OPTION', 'missing mount path');
    }

    volume.metadata.values[MOUNT_PATH_KEY] = targetPath;
    return resultReply({});
  }

  async NodeUnpublishVolume(request: object): Promise<object> {
    const lookup = lookupId(VolumeRequestSchema.parse(request).volumeId);
    if (!lookup.ok) {
      return lookup.reason === 'missing id val'
        ? nodeUnpublishVolumeErrorReply('VOLUME_DOES_NOT_EXIST', lookup.reason)
        : generalErrorReply('MISSING_REQUIRED_FIELD', lookup.reason);
    }

    const volume = this.catalogue.find('id', lookup.id);
    if (!volume) {
      return nodeUnpublishVolumeErrorReply('VOLUME_DOES_NOT_EXIST', 'missing volume');
    }

    delete volume.metadata.values[MOUNT_PATH_KEY];
    return resultReply({});
  }

  async GetNodeID(): Promise<object> {
    return resultReply({ nodeId: { values: { id: MOCK_NODE_ID } } });
  }

  async ProbeNode(): Promise<object> {
    return resultReply({});
  }

  async NodeGetCapabilities(): Promise<object> {
    return resultReply({
      capabilities: [
        {
          volumeCapability: {
            mount: { fsType: 'ext4', mountFlags: ['norootsquash', 'uid=500', 'gid=500'] },
          },
        },
      ],
    });
  }
}
