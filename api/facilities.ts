// api/facilities.ts
// GET → the receiving-facility directory rows are validated against.

import type { VercelRequest, VercelResponse } from '@vercel/node';

import type { HttpRequestLike, HttpResponseLike } from './responses';
import { SCHEMA_VERSION } from '../engine/constants';
import { RequestErrorCodes } from '../engine/errorCodes';
import { DEFAULT_FACILITY_DIRECTORY, type FacilityDirectory } from '../engine/facilityDirectory';
import type { FacilityEntry } from '../engine/types';

export interface FacilitiesBody {
  schema_version: string;
  facilities: FacilityEntry[];
}

export function listFacilities(directory: FacilityDirectory): FacilitiesBody {
  return {
    schema_version: SCHEMA_VERSION,
    facilities: directory.entries().map((e) => ({ ...e }))
  };
}

export function createFacilitiesHandler(directory: FacilityDirectory) {
  return (req: HttpRequestLike, res: HttpResponseLike): void => {
    if (req.method !== 'GET') {
      res.setHeader('Allow', 'GET');
      res.status(405).json({
        error: 'Method Not Allowed',
        error_code: RequestErrorCodes.METHOD_NOT_ALLOWED
      });
      return;
    }
    res.setHeader('Cache-Control', 'public, max-age=300');
    res.status(200).json(listFacilities(directory));
  };
}

const handle = createFacilitiesHandler(DEFAULT_FACILITY_DIRECTORY);

export default function handler(req: VercelRequest, res: VercelResponse): void {
  handle(req, res);
}
