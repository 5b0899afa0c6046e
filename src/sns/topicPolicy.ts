import { InvalidParameterError } from "../common/errors.ts";
import type { PolicyDocument, PolicyStatement } from "./snsTypes.ts";

export const VALID_POLICY_ACTIONS: ReadonlySet<string> = new Set([
  "GetTopicAttributes",
  "SetTopicAttributes",
  "AddPermission",
  "RemovePermission",
  "DeleteTopic",
  "Subscribe",
  "ListSubscriptionsByTopic",
  "Publish",
  "Receive",
]);

export function defaultTopicPolicy(topicArn: string, accountId: string): PolicyDocument {
  return {
    Version: "2008-10-17",
    Id: "__default_policy_ID",
    Statement: [
      {
        Effect: "Allow",
        Sid: "__default_statement_ID",
        Principal: { AWS: "*" },
        Action: Array.from(VALID_POLICY_ACTIONS, (action) => `SNS:${action}`),
        Resource: topicArn,
        Condition: { StringEquals: { "AWS:SourceOwner": accountId } },
      },
    ],
  };
}

export function parsePolicyDocument(json: string): PolicyDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    throw new InvalidParameterError("Invalid parameter: Policy Error: failed to parse JSON");
  }
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new InvalidParameterError("Invalid parameter: Policy Error: policy must be a JSON object");
  }

  const statements: unknown = Reflect.get(raw, "Statement");
  if (!Array.isArray(statements) || !statements.every(isPolicyStatement)) {
    throw new InvalidParameterError(
      "Invalid parameter: Policy Error: Statement must be a list of statements with a Sid",
    );
  }
  const version: unknown = Reflect.get(raw, "Version");
  const id: unknown = Reflect.get(raw, "Id");
  return {
    Version: typeof version === "string" ? version : "2008-10-17",
    Id: typeof id === "string" ? id : "__default_policy_ID",
    Statement: statements,
  };
}

function isPolicyStatement(value: unknown): value is PolicyStatement {
  return (
    typeof value === "object" &&
    value !== null &&
    typeof Reflect.get(value, "Sid") === "string" &&
    typeof Reflect.get(value, "Effect") === "string"
  );
}

/**
 * Returns a copy of `policy` with an Allow statement for `label`. Single-element
 * principal and action lists collapse to scalars.
 */
export function withPermission(
  policy: PolicyDocument,
  topicArn: string,
  label: string,
  accountIds: string[],
  actionNames: string[],
): PolicyDocument {
  if (policy.Statement.some((statement) => statement.Sid === label)) {
    throw new InvalidParameterError("Statement already exists");
  }
  if (actionNames.some((action) => !VALID_POLICY_ACTIONS.has(action))) {
    throw new InvalidParameterError("Policy statement action out of service scope!");
  }

  const principals = accountIds.map((accountId) => `arn:aws:iam::${accountId}:root`);
  const actions = actionNames.map((action) => `SNS:${action}`);

  const statement: PolicyStatement = {
    Sid: label,
    Effect: "Allow",
    Principal: { AWS: principals.length === 1 ? principals[0] : principals },
    Action: actions.length === 1 ? actions[0] : actions,
    Resource: topicArn,
  };
  return { ...policy, Statement: [...policy.Statement, statement] };
}

export function withoutPermission(policy: PolicyDocument, label: string): PolicyDocument {
  return {
    ...policy,
    Statement: policy.Statement.filter((statement) => statement.Sid !== label),
  };
}
