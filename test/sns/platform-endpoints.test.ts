import { describe, it, expect, beforeAll, afterAll } from "vitest";
import {
  CreatePlatformApplicationCommand,
  CreatePlatformEndpointCommand,
  DeleteEndpointCommand,
  DeletePlatformApplicationCommand,
  GetEndpointAttributesCommand,
  GetPlatformApplicationAttributesCommand,
  ListEndpointsByPlatformApplicationCommand,
  ListPlatformApplicationsCommand,
  PublishCommand,
  SetEndpointAttributesCommand,
} from "@aws-sdk/client-sns";
import { createSnsClient } from "../helpers/clients.ts";
import { createTestServer, type TestServer } from "../helpers/setup.ts";

describe("SNS platform endpoints", () => {
  let server: TestServer;
  let sns: ReturnType<typeof createSnsClient>;

  beforeAll(async () => {
    server = await createTestServer();
    sns = createSnsClient(server.port);
  });

  afterAll(async () => {
    sns.destroy();
    await server.app.close();
  });

  async function application(name: string): Promise<string> {
    const result = await sns.send(
      new CreatePlatformApplicationCommand({
        Name: name,
        Platform: "GCM",
        Attributes: { PlatformCredential: "test-secret" },
      }),
    );
    return result.PlatformApplicationArn!;
  }

  it("creates and lists applications", async () => {
    const arn = await application("mobile-list");
    expect(arn).toBe("arn:aws:sns:us-east-1:000000000000:app/GCM/mobile-list");

    const { Attributes } = await sns.send(
      new GetPlatformApplicationAttributesCommand({ PlatformApplicationArn: arn }),
    );
    expect(Attributes).toEqual({ PlatformCredential: "test-secret" });

    const list = await sns.send(new ListPlatformApplicationsCommand({}));
    expect(list.PlatformApplications?.map((a) => a.PlatformApplicationArn)).toContain(arn);
  });

  it("resolves a token to the same endpoint", async () => {
    const appArn = await application("mobile-dedup");
    const first = await sns.send(
      new CreatePlatformEndpointCommand({ PlatformApplicationArn: appArn, Token: "device-1" }),
    );
    const second = await sns.send(
      new CreatePlatformEndpointCommand({ PlatformApplicationArn: appArn, Token: "device-1" }),
    );
    expect(second.EndpointArn).toBe(first.EndpointArn);

    const listed = await sns.send(
      new ListEndpointsByPlatformApplicationCommand({ PlatformApplicationArn: appArn }),
    );
    expect(listed.Endpoints).toEqual([
      { EndpointArn: first.EndpointArn, Attributes: { Token: "device-1", Enabled: "true" } },
    ]);
  });

  it("publishes to enabled endpoints and refuses disabled ones", async () => {
    const appArn = await application("mobile-publish");
    const { EndpointArn } = await sns.send(
      new CreatePlatformEndpointCommand({
        PlatformApplicationArn: appArn,
        Token: "device-2",
        CustomUserData: "user-7",
      }),
    );

    await sns.send(new PublishCommand({ TargetArn: EndpointArn, Message: "push" }));
    const endpoint = server.stores.sns.get().getEndpoint(EndpointArn!);
    expect(endpoint.messages.map((m) => m.message)).toEqual(["push"]);

    await sns.send(
      new SetEndpointAttributesCommand({ EndpointArn, Attributes: { Enabled: "false" } }),
    );
    const { Attributes } = await sns.send(new GetEndpointAttributesCommand({ EndpointArn }));
    expect(Attributes).toMatchObject({ Enabled: "false", CustomUserData: "user-7" });

    await expect(sns.send(new PublishCommand({ TargetArn: EndpointArn, Message: "push" }))).rejects.toThrow(
      "Endpoint is disabled",
    );
  });

  it("deletes endpoints with their application", async () => {
    const appArn = await application("mobile-delete");
    const { EndpointArn } = await sns.send(
      new CreatePlatformEndpointCommand({ PlatformApplicationArn: appArn, Token: "device-3" }),
    );

    await sns.send(new DeletePlatformApplicationCommand({ PlatformApplicationArn: appArn }));

    await expect(sns.send(new GetEndpointAttributesCommand({ EndpointArn }))).rejects.toThrow(
      "Endpoint does not exist",
    );
    await expect(sns.send(new DeleteEndpointCommand({ EndpointArn }))).rejects.toThrow(
      "Endpoint does not exist",
    );
  });
});
