// Builders for domain-error replies.
//
// A domain error is a successful RPC whose reply oneof carries `error`
// instead of `result`. Callers branch on the payload, never on the status.

export type GeneralErrorCode =
  | 'UNKNOWN'
  | 'UNDEFINED'
  | 'UNSUPPORTED_REQUEST_VERSION'
  | 'MISSING_REQUIRED_FIELD';

export type CreateVolumeErrorCode =
  | 'UNKNOWN'
  | 'CALL_NOT_IMPLEMENTED'
  | 'OPERATION_PENDING_FOR_VOLUME'
  | 'INVALID_VOLUME_NAME'
  | 'UNSUPPORTED_CAPACITY_RANGE'
  | 'VOLUME_ALREADY_EXISTS'
  | 'UNSUPPORTED_VOLUME_TYPE'
  | 'INVALID_PARAMETER';

export type DeleteVolumeErrorCode =
  | 'UNKNOWN'
  | 'CALL_NOT_IMPLEMENTED'
  | 'OPERATION_PENDING_FOR_VOLUME'
  | 'INVALID_VOLUME_ID'
  | 'VOLUME_DOES_NOT_EXIST';

export type ControllerPublishVolumeErrorCode =
  | 'UNKNOWN'
  | 'CALL_NOT_IMPLEMENTED'
  | 'OPERATION_PENDING_FOR_VOLUME'
  | 'INVALID_VOLUME_ID'
  | 'UNSUPPORTED_VOLUME_TYPE'
  | 'VOLUME_DOES_NOT_EXIST'
  | 'VOLUME_ALREADY_PUBLISHED'
  | 'INVALID_NODE_ID'
  | 'VOLUME_ALREADY_ATTACHED'
  | 'NODE_DOES_NOT_EXIST';

export type ControllerUnpublishVolumeErrorCode =
  | 'UNKNOWN'
  | 'CALL_NOT_IMPLEMENTED'
  | 'OPERATION_PENDING_FOR_VOLUME'
  | 'INVALID_VOLUME_ID'
  | 'UNSUPPORTED_VOLUME_TYPE'
  | 'VOLUME_DOES_NOT_EXIST'
  | 'NODE_DOES_NOT_EXIST'
  | 'INVALID_NODE_ID'
  | 'VOLUME_NOT_ATTACHED_TO_SPECIFIED_NODE'
  | 'NODE_ID_REQUIRED';

export type ValidateVolumeCapabilitiesErrorCode =
  | 'UNKNOWN'
  | 'VOLUME_DOES_NOT_EXIST'
  | 'UNSUPPORTED_MOUNT_OPTION'
  | 'UNSUPPORTED_VOLUME_TYPE'
  | 'UNSUPPORTED_FS_TYPE'
  | 'INVALID_VOLUME_INFO';

export type NodePublishVolumeErrorCode =
  | 'UNKNOWN'
  | 'OPERATION_PENDING_FOR_VOLUME'
  | 'VOLUME_DOES_NOT_EXIST'
  | 'UNSUPPORTED_MOUNT_OPTION'
  | 'UNSUPPORTED_VOLUME_TYPE'
  | 'UNSUPPORTED_FS_TYPE'
  | 'MOUNT_ERROR'
  | 'INVALID_VOLUME_ID';

export type NodeUnpublishVolumeErrorCode =
  | 'UNKNOWN'
  | 'OPERATION_PENDING_FOR_VOLUME'
  | 'VOLUME_DOES_NOT_EXIST'
  | 'UNMOUNT_ERROR'
  | 'INVALID_VOLUME_ID';

export interface ErrorDetail<C extends string> {
  errorCode: C;
  errorDescription: string;
}

export interface GeneralErrorDetail extends ErrorDetail<GeneralErrorCode> {
  callerMustNotRetry: boolean;
}

export type ProtocolError =
  | { generalError: GeneralErrorDetail }
  | { createVolumeError: ErrorDetail<CreateVolumeErrorCode> }
  | { deleteVolumeError: ErrorDetail<DeleteVolumeErrorCode> }
  | { controllerPublishVolumeError: ErrorDetail<ControllerPublishVolumeErrorCode> }
  | { controllerUnpublishVolumeError: ErrorDetail<ControllerUnpublishVolumeErrorCode> }
  | { validateVolumeCapabilitiesError: ErrorDetail<ValidateVolumeCapabilitiesErrorCode> }
  | { nodePublishVolumeError: ErrorDetail<NodePublishVolumeErrorCode> }
  | { nodeUnpublishVolumeError: ErrorDetail<NodeUnpublishVolumeErrorCode> };

export interface ErrorReply {
  error: ProtocolError;
}

export interface ResultReply<R extends object> {
  result: R;
}

export function resultReply<R extends object>(result: R): ResultReply<R> {
  return { result };
}

export function generalErrorReply(code: GeneralErrorCode, description: string): ErrorReply {
  return {
    error: {
      generalError: { errorCode: code, callerMustNotRetry: false, errorDescription: description },
    },
  };
}

export function createVolumeErrorReply(
  code: CreateVolumeErrorCode,
  description: string
): ErrorReply {
  return { error: { createVolumeError: { errorCode: code, errorDescription: description } } };
}

export function deleteVolumeErrorReply(
  code: DeleteVolumeErrorCode,
  description: string
): ErrorReply {
  return { error: { deleteVolumeError: { errorCode: code, errorDescription: description } } };
}

export function controllerPublishVolumeErrorReply(
  code: ControllerPublishVolumeErrorCode,
  description: string
): ErrorReply {
  return {
    error: { controllerPublishVolumeError: { errorCode: code, errorDescription: description } },
  };
}

export function controllerUnpublishVolumeErrorReply(
  code: ControllerUnpublishVolumeErrorCode,
  description: string
): ErrorReply {
  return {
    error: { controllerUnpublishVolumeError: { errorCode: code, errorDescription: description } },
  };
}

export function validateVolumeCapabilitiesErrorReply(
  code: ValidateVolumeCapabilitiesErrorCode,
  description: string
): ErrorReply {
  return {
    error: { validateVolumeCapabilitiesError: { errorCode: code, errorDescription: description } },
  };
}

export function nodePublishVolumeErrorReply(
  code: NodePublishVolumeErrorCode,
  description: string
): ErrorReply {
  return {
    error: { nodePublishVolumeError: { errorCode: code, errorDescription: description } },
  };
}

export function nodeUnpublishVolumeErrorReply(
  code: NodeUnpublishVolumeErrorCode,
  description: string
): ErrorReply {
  return {
    error: { nodeUnpublishVolumeError: { errorCode: code, errorDescription: description } },
  };
}
