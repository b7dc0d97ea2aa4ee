import { z } from "zod";

const API_NAME = /^[A-Za-z][A-Za-z0-9_]*$/;
const RECORD_ID = /^[A-Za-z0-9]{15}(?:[A-Za-z0-9]{3})?$/;

export const MAX_BULK_RECORDS = 10000;

export const nonEmptyString = z.string().trim().min(1, "must not be empty");

export const objectNameSchema = z
  .string()
  .trim()
  .regex(API_NAME, "must be an object API name such as Account or Invoice__c");

export const fieldNameSchema = z
  .string()
  .trim()
  .regex(API_NAME, "must be a field API name such as Name or Score__c");

export const recordIdSchema = z
  .string()
  .trim()
  .regex(RECORD_ID, "must be a 15 or 18 character Salesforce ID");

export const fieldValuesSchema = z
  .record(z.unknown())
  .refine((data) => Object.keys(data).length > 0, "must contain at least one field");

export const httpMethodSchema = z
  .string()
  .transform((method) => method.toUpperCase())
  .pipe(z.enum(["GET", "POST", "PUT", "PATCH", "DELETE"]))
  .default("GET");

export const recordsSchema = z
  .array(z.record(z.unknown()))
  .min(1, "must contain at least one record")
  .max(MAX_BULK_RECORDS, `must contain at most ${MAX_BULK_RECORDS} records`);

export const recordsWithIdSchema = z
  .array(z.object({ Id: recordIdSchema }).passthrough())
  .min(1, "must contain at least one record")
  .max(MAX_BULK_RECORDS, `must contain at most ${MAX_BULK_RECORDS} records`);
