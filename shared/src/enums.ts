// Where API calls go for the current process
export const HarnessMode = {
  LIVE: 'live',
  RECORD: 'record',
  REPLAY: 'replay',
} as const;
export type HarnessMode = (typeof HarnessMode)[keyof typeof HarnessMode];

// Identifier kinds removed from a recording before it is archived
export const ScrubTarget = {
  ACCOUNT_ID: 'ACCOUNT_ID',
  USER_ID: 'USER_ID',
  LOCAL_USER: 'LOCAL_USER',
} as const;
export type ScrubTarget = (typeof ScrubTarget)[keyof typeof ScrubTarget];

// Supported API operations, `<service>:<Action>`
export const OperationName = {
  STS_GET_CALLER_IDENTITY: 'sts:GetCallerIdentity',
  EC2_DESCRIBE_INSTANCES: 'ec2:DescribeInstances',
  EC2_TERMINATE_INSTANCES: 'ec2:TerminateInstances',
  IAM_GET_ROLE: 'iam:GetRole',
  IAM_CREATE_ROLE: 'iam:CreateRole',
  IAM_DELETE_ROLE: 'iam:DeleteRole',
} as const;
export type OperationName = (typeof OperationName)[keyof typeof OperationName];
