import { randomBytes } from "node:crypto";
import path from "node:path";

import { UploadError } from "./errors";

const EDF_HEADER_BYTES = 256;
const PATIENT_OFFSET = 8;
const RECORDING_OFFSET = 88;
const STARTDATE_OFFSET = 168;
const STARTTIME_OFFSET = 176;

const ANON_PATIENT = "X X X X_X";
const ANON_RECORDING = "Startdate 01-JAN-1970 X X X";
const ANON_STARTDATE = "01.01.70";
const ANON_STARTTIME = "00.00.00";

export function randomHexString(bytes = 6): string {
  return randomBytes(bytes).toString("hex");
}

function writeAscii(target: Uint8Array, offset: number, text: string, width: number): void {
  const padded = text.padEnd(width, " ");
  for (let i = 0; i < width; i++) target[offset + i] = padded.charCodeAt(i);
}

export function isEdfHeader(data: Uint8Array): boolean {
  if (data.length < EDF_HEADER_BYTES) return false;
  const version = new TextDecoder("ascii").decode(data.subarray(0, 8));
  return version.trim() === "0";
}

/**
 * Returns a copy of an EDF(+) recording with the patient identification,
 * recording identification, start date and start time header fields
 * overwritten. Signal data, channel labels and annotations are untouched.
 * The input is left unmodified.
 */
export function anonymizeEdf(data: Uint8Array): Uint8Array {
  if (!isEdfHeader(data)) {
    throw new UploadError("Cannot anonymize: input does not start with an EDF(+) header");
  }
  const copy = new Uint8Array(data);
  writeAscii(copy, PATIENT_OFFSET, ANON_PATIENT, 80);
  writeAscii(copy, RECORDING_OFFSET, ANON_RECORDING, 80);
  writeAscii(copy, STARTDATE_OFFSET, ANON_STARTDATE, 8);
  writeAscii(copy, STARTTIME_OFFSET, ANON_STARTTIME, 8);
  return copy;
}

/** File name to upload in place of one that may itself identify the patient. */
export function anonymousFilename(filename: string): string {
  return `${randomHexString()}${path.extname(filename).toLowerCase()}`;
}
