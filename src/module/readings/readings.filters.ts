// src/module/readings/readings.filters.ts
import type { FilterQuery } from 'mongoose';
import { METADATA_FILTER_KEYS, MetadataFilter, ReadingPredicate } from './readings.types';
import type { Reading } from './readings.schema';

/** `metadata.<key>: value` clauses for every filter key that is set. */
export function metadataMatch(filters: MetadataFilter = {}): FilterQuery<Reading> {
  const match: FilterQuery<Reading> = {};
  for (const key of METADATA_FILTER_KEYS) {
    const value = filters[key];
    if (value !== undefined && value !== '') {
      match[`metadata.${key}`] = value;
    }
  }
  return match;
}

export function predicateMatch(predicate: ReadingPredicate): FilterQuery<Reading> {
  const match = metadataMatch(predicate.metadata);
  if (predicate.before) {
    match.timestamp = { $lt: predicate.before };
  }
  return match;
}
