import { UnknownVariantError } from 'struct-layout-ts';

/** Result codes carried by storage responses. */
export const Status = {
  SUCCESS: 0x00,
  EIO: 0x01,
  EKEY: 0x02,
  FAIL: 0xff,
} as const;

export type StatusCode = (typeof Status)[keyof typeof Status];

const STATUS_CODES: readonly StatusCode[] = Object.values(Status);

export function toStatus(code: number): StatusCode {
  const status = STATUS_CODES.find(s => s === code);
  if (status === undefined) {
    throw new UnknownVariantError('status code', code);
  }
  return status;
}

export function statusName(status: StatusCode): keyof typeof Status {
  switch (status) {
    case Status.SUCCESS:
      return 'SUCCESS';
    case Status.EIO:
      return 'EIO';
    case Status.EKEY:
      return 'EKEY';
    case Status.FAIL:
      return 'FAIL';
  }
}
