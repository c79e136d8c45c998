import { describe, it, expect, vi, beforeEach } from "vitest";
import type { Mock } from "vitest";
import type { Logger } from "pino";
import { createSmtpSender } from "./sender";
import type { MailTransport, TransportFactory } from "./sender";
import { createMockLogger } from "../test-utils/config";

const htmlBody = { plainTextBody: "fallback", htmlBody: "<html>briefing</html>" };
const credentials = {
  sender: "me@gmail.com",
  password: "test-password",
  recipient: "you@example.org",
};

describe("createSmtpSender", () => {
  let mockLogger: Logger;
  let transport: { sendMail: Mock; close: Mock };
  let transportFactory: Mock<TransportFactory>;

  beforeEach(() => {
    mockLogger = createMockLogger();
    transport = {
      sendMail: vi.fn().mockResolvedValue({ messageId: "<msg-123@example.org>" }),
      close: vi.fn(),
    };
    transportFactory = vi.fn<TransportFactory>(() => transport as MailTransport);
  });

  it("should send one multipart message over implicit TLS", async () => {
    const deliver = createSmtpSender(transportFactory);

    const result = await deliver("Daily Subject", htmlBody, credentials, mockLogger);

    expect(result).toEqual({ success: true, messageId: "<msg-123@example.org>" });
    expect(transportFactory).toHaveBeenCalledOnce();
    expect(transportFactory).toHaveBeenCalledWith({
      host: "smtp.gmail.com",
      port: 465,
      secure: true,
      auth: { user: "me@gmail.com", pass: "test-password" },
    });
    expect(transport.sendMail).toHaveBeenCalledOnce();
    expect(transport.sendMail).toHaveBeenCalledWith({
      from: "me@gmail.com",
      to: "you@example.org",
      subject: "Daily Subject",
      text: "fallback",
      html: "<html>briefing</html>",
    });
    expect(transport.close).toHaveBeenCalledOnce();
    expect(mockLogger.info).toHaveBeenCalledWith(
      { messageId: "<msg-123@example.org>", recipient: "you@example.org", host: "smtp.gmail.com" },
      "briefing email sent",
    );
  });

  it("should send a text-only message when there is no HTML part", async () => {
    const deliver = createSmtpSender(transportFactory);

    await deliver("Plain", { plainTextBody: "## Report" }, credentials, mockLogger);

    expect(transport.sendMail).toHaveBeenCalledWith({
      from: "me@gmail.com",
      to: "you@example.org",
      subject: "Plain",
      text: "## Report",
    });
  });

  it("should use the host matched from the sender domain", async () => {
    const deliver = createSmtpSender(transportFactory);

    await deliver("Subject", htmlBody, { ...credentials, sender: "me@qq.com" }, mockLogger);

    expect(transportFactory).toHaveBeenCalledWith(
      expect.objectContaining({ host: "smtp.qq.com", auth: { user: "me@qq.com", pass: "test-password" } }),
    );
  });

  it("should return MissingConfig without opening a connection when the recipient is absent", async () => {
    const deliver = createSmtpSender(transportFactory);

    const result = await deliver(
      "Subject",
      htmlBody,
      { sender: "me@gmail.com", password: "test-password" },
      mockLogger,
    );

    expect(result).toEqual({
      success: false,
      error: { kind: "MissingConfig", missing: ["recipient"] },
    });
    expect(transportFactory).toHaveBeenCalledTimes(0);
    expect(transport.sendMail).toHaveBeenCalledTimes(0);
  });

  it("should list every missing field", async () => {
    const deliver = createSmtpSender(transportFactory);

    const result = await deliver("Subject", htmlBody, { sender: "  " }, mockLogger);

    expect(result).toEqual({
      success: false,
      error: { kind: "MissingConfig", missing: ["sender", "password", "recipient"] },
    });
    expect(transportFactory).not.toHaveBeenCalled();
  });

  it("should return DeliverError and still close the transport when sending fails", async () => {
    transport.sendMail.mockRejectedValue(new Error("535 Authentication failed"));
    const deliver = createSmtpSender(transportFactory);

    const result = await deliver("Subject", htmlBody, credentials, mockLogger);

    expect(result).toEqual({
      success: false,
      error: { kind: "DeliverError", message: "535 Authentication failed" },
    });
    expect(transport.close).toHaveBeenCalledOnce();
    expect(mockLogger.error).toHaveBeenCalledWith(
      { recipient: "you@example.org", host: "smtp.gmail.com", error: "535 Authentication failed" },
      "briefing email send failed",
    );
  });

  it("should return DeliverError when the transport cannot be created", async () => {
    transportFactory.mockImplementation(() => {
      throw new Error("unsupported transport options");
    });
    const deliver = createSmtpSender(transportFactory);

    const result = await deliver("Subject", htmlBody, credentials, mockLogger);

    expect(result).toEqual({
      success: false,
      error: { kind: "DeliverError", message: "unsupported transport options" },
    });
    expect(transport.close).not.toHaveBeenCalled();
  });

  it("should convert non-Error rejections into the message", async () => {
    transport.sendMail.mockRejectedValue("connection reset");
    const deliver = createSmtpSender(transportFactory);

    const result = await deliver("Subject", htmlBody, credentials, mockLogger);

    expect(result).toEqual({
      success: false,
      error: { kind: "DeliverError", message: "connection reset" },
    });
  });
});
