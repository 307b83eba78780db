/**
 * @fileoverview Centralized export module for print backend type definitions.
 */

export type {
  PrintBackend,
  ReportParameterValue,
  ReportParameters,
  RequestParameters,
  ReconcileCounters,
  ActionResultType,
  ActionResult
} from './backend-operations';
