import { z } from "zod";
import { LakegateError } from "../lakegate/errors.js";
import { deepFreeze } from "../lakegate/utils/freeze.js";
import type { PermissionRequirement } from "./types.js";

/**
 * Operation -> required permissions.
 *
 * `resource` says whether the operation addresses a bucket: "bucket" needs
 * one, "optional" checks it only when given, "none" ignores it.
 */
const OPERATION_TABLE = {
  // Bucket operations
  bucket_objects_list: { permissions: ["s3:ListBucket", "s3:GetBucketLocation"], resource: "bucket" },
  bucket_object_info: { permissions: ["s3:GetObject", "s3:GetObjectVersion"], resource: "bucket" },
  bucket_object_text: { permissions: ["s3:GetObject"], resource: "bucket" },
  bucket_object_fetch: { permissions: ["s3:GetObject", "s3:GetObjectVersion"], resource: "bucket" },
  bucket_objects_put: { permissions: ["s3:PutObject", "s3:PutObjectAcl"], resource: "bucket" },
  bucket_object_link: { permissions: ["s3:GetObject"], resource: "bucket" },

  // Package operations
  package_create: { permissions: ["s3:PutObject", "s3:PutObjectAcl", "s3:ListBucket", "s3:GetObject"], resource: "bucket" },
  package_update: { permissions: ["s3:GetObject", "s3:PutObject", "s3:ListBucket", "s3:DeleteObject"], resource: "bucket" },
  package_delete: { permissions: ["s3:DeleteObject", "s3:ListBucket"], resource: "bucket" },
  package_browse: { permissions: ["s3:ListBucket", "s3:GetObject"], resource: "bucket" },
  package_contents_search: { permissions: ["s3:ListBucket"], resource: "bucket" },
  package_diff: { permissions: ["s3:ListBucket", "s3:GetObject"], resource: "bucket" },
  create_package_enhanced: { permissions: ["s3:PutObject", "s3:PutObjectAcl", "s3:ListBucket", "s3:GetObject"], resource: "bucket" },
  create_package_from_s3: { permissions: ["s3:ListBucket", "s3:GetObject", "s3:PutObject", "s3:PutObjectAcl"], resource: "bucket" },
  package_create_from_s3: { permissions: ["s3:ListBucket", "s3:GetObject", "s3:PutObject", "s3:PutObjectAcl"], resource: "bucket" },

  // Query catalog operations
  athena_query_execute: {
    permissions: ["athena:StartQueryExecution", "athena:GetQueryExecution", "athena:GetQueryResults", "athena:StopQueryExecution"],
    resource: "none"
  },
  athena_databases_list: { permissions: ["glue:GetDatabases"], resource: "none" },
  athena_tables_list: { permissions: ["glue:GetTables", "glue:GetDatabase"], resource: "none" },
  athena_table_schema: { permissions: ["glue:GetTable", "glue:GetDatabase"], resource: "none" },
  athena_workgroups_list: { permissions: ["athena:ListWorkGroups"], resource: "none" },
  athena_query_history: { permissions: ["athena:ListQueryExecutions", "athena:BatchGetQueryExecution"], resource: "none" },

  // Tabulator
  tabulator_tables_list: { permissions: ["glue:GetDatabases", "glue:GetTables"], resource: "none" },
  tabulator_table_create: { permissions: ["glue:CreateTable", "glue:GetTable", "s3:ListBucket"], resource: "bucket" },

  // Search
  unified_search: { permissions: ["s3:ListBucket", "glue:GetTables", "glue:GetDatabases"], resource: "optional" },
  packages_search: { permissions: ["s3:ListBucket"], resource: "optional" },

  // Permission discovery
  aws_permissions_discover: {
    permissions: ["iam:ListAttachedUserPolicies", "iam:ListUserPolicies", "iam:GetPolicy", "iam:GetPolicyVersion"],
    resource: "none"
  },
  bucket_access_check: { permissions: ["s3:ListBucket", "s3:GetBucketLocation"], resource: "bucket" },
  bucket_recommendations_get: { permissions: ["s3:ListAllMyBuckets"], resource: "none" }
} as const satisfies Record<string, PermissionRequirement>;

export type OperationName = keyof typeof OPERATION_TABLE;

const PermissionRequirementSchema = z.object({
  permissions: z.array(z.string().regex(/^[a-z0-9-]+:[A-Za-z*]+$/, "expected service:Action")).min(1),
  resource: z.enum(["bucket", "optional", "none"])
});

const OperationTableSchema = z.record(z.string().regex(/^[a-z][a-z0-9_]*$/), PermissionRequirementSchema);

export type OperationTable = ReadonlyMap<string, PermissionRequirement>;

/**
 * Validate and freeze an operation table. Throws CONFIG_INVALID on a bad entry.
 */
export function buildOperationTable(table: Record<string, PermissionRequirement>): OperationTable {
  const parsed = OperationTableSchema.safeParse(table);
  if (!parsed.success) {
    throw new LakegateError("CONFIG_INVALID", "Operation permission table is invalid", {
      issues: parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`)
    });
  }
  const entries = Object.entries(parsed.data).map(
    ([name, requirement]): [string, PermissionRequirement] => [name, deepFreeze(requirement)]
  );
  return new Map(entries);
}

export function isOperationName(name: string): name is OperationName {
  return Object.hasOwn(OPERATION_TABLE, name);
}

export const DEFAULT_OPERATIONS: OperationTable = buildOperationTable(OPERATION_TABLE);
