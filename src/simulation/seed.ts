import fs from "fs";
import { z } from "zod";
import { MAX_COORDINATE } from "../constants";
import { SeedError } from "../errors";
import type { Coordinate } from "../types/grid-types";

const CoordinateValueSchema = z.number().int().min(0).max(MAX_COORDINATE);

/** `{ "cells": [[row, col], ...] }` */
export const SeedSchema = z.object({
  cells: z.array(z.tuple([CoordinateValueSchema, CoordinateValueSchema])),
});

export type SeedDocument = z.infer<typeof SeedSchema>;

/** Parse and validate a seed document, returning its coordinate list. */
export function parseSeed(text: string): Coordinate[] {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new SeedError(`Seed is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  const result = SeedSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    throw new SeedError(`Invalid seed at ${path}: ${issue.message}`);
  }
  return result.data.cells;
}

export function loadSeedFile(path: string): Coordinate[] {
  let text: string;
  try {
    text = fs.readFileSync(path, "utf8");
  } catch (err) {
    throw new SeedError(`Cannot read seed file ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseSeed(text);
}
