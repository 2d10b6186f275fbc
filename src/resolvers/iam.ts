/**
 * IAM and STS lookups.
 *
 * IAM is a global service; the region only selects the API endpoint.
 */

import { GetInstanceProfileCommand, GetServerCertificateCommand } from "@aws-sdk/client-iam";
import { GetCallerIdentityCommand } from "@aws-sdk/client-sts";
import type { AwsContext } from "@core/context";
import { NoMatchError, callAws } from "@core/errors";
import { requireValue } from "@core/query";
import type { OptionalScope } from "@/types";

export interface IamNameQuery extends OptionalScope {
  name: string;
}

const NOT_FOUND = ["NoSuchEntityException", "NoSuchEntity"];

/**
 * Resolves the ARN of an IAM server certificate.
 *
 * @throws {NoMatchError} If the certificate does not exist
 */
export async function resolveServerCertificateArn(
  context: AwsContext,
  query: IamNameQuery
): Promise<string> {
  const name = requireValue("server certificate name", query.name);
  const client = context.iam(context.region(query.region), query.profile);

  const response = await callAws(
    "GetServerCertificate",
    () => client.send(new GetServerCertificateCommand({ ServerCertificateName: name })),
    NOT_FOUND
  );
  const arn = response.ServerCertificate?.ServerCertificateMetadata?.Arn;
  if (!arn) {
    throw new NoMatchError(`Server Certificate ${name} was not found`);
  }
  return arn;
}

/**
 * Resolves the ARN of an IAM instance profile.
 *
 * @throws {NoMatchError} If the instance profile does not exist
 */
export async function resolveInstanceProfileArn(
  context: AwsContext,
  query: IamNameQuery
): Promise<string> {
  const name = requireValue("instance profile name", query.name);
  const client = context.iam(context.region(query.region), query.profile);

  const response = await callAws(
    "GetInstanceProfile",
    () => client.send(new GetInstanceProfileCommand({ InstanceProfileName: name })),
    NOT_FOUND
  );
  const arn = response.InstanceProfile?.Arn;
  if (!arn) {
    throw new NoMatchError(`IAM instance profile ${name} was not found`);
  }
  return arn;
}

/**
 * Resolves the account id of the calling credentials.
 */
export async function resolveAccountId(
  context: AwsContext,
  query: OptionalScope = {}
): Promise<string> {
  const client = context.sts(context.region(query.region), query.profile);
  const response = await callAws("GetCallerIdentity", () =>
    client.send(new GetCallerIdentityCommand({}))
  );
  if (!response.Account) {
    throw new NoMatchError("GetCallerIdentity returned no account id");
  }
  return response.Account;
}
