// STS
export {
  STSService,
  principalFromArn,
} from "./sts/sts-service";
export type {
  STSCredentials,
  STSServiceOptions,
  CallerIdentity,
} from "./sts/sts-service";
