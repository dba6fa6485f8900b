import { Response } from "express";
import { AuthenticatedRequest } from "../types/express";
import { signToken } from "../utils/authToken";
import { attachVisitor, loadVisitorState } from "./sessionMiddleware";

const mockLoadVisitor = jest.fn();

jest.mock("../services/visitor.service", () => ({
  loadVisitor: (...args: unknown[]) => mockLoadVisitor(...args),
}));

const SESSION_ID = "6f1c1b7e-2f43-4c7f-9a39-0c1e1f0f7a11";

function makeRequest(cookies: Record<string, string> = {}): AuthenticatedRequest {
  return { cookies, secure: false } as unknown as AuthenticatedRequest;
}

function makeResponse() {
  const res = {
    cookie: jest.fn(),
    status: jest.fn().mockReturnThis(),
    json: jest.fn().mockReturnThis(),
  };
  return { res, response: res as unknown as Response };
}

describe("attachVisitor", () => {
  it("issues a session cookie to a new browser", () => {
    const req = makeRequest();
    const { res, response } = makeResponse();
    const next = jest.fn();

    attachVisitor(req, response, next);

    expect(req.sessionId).toMatch(/^[0-9a-f-]{36}$/);
    expect(res.cookie).toHaveBeenCalledWith(
      "sessionId",
      req.sessionId,
      expect.objectContaining({ httpOnly: true, sameSite: "lax" })
    );
    expect(next).toHaveBeenCalled();
  });

  it("keeps an existing session cookie", () => {
    const req = makeRequest({ sessionId: SESSION_ID });
    const { res, response } = makeResponse();

    attachVisitor(req, response, jest.fn());

    expect(req.sessionId).toBe(SESSION_ID);
    expect(res.cookie).not.toHaveBeenCalled();
  });

  it("attaches the user from a valid token", () => {
    const token = signToken({ id: 3, role: "user", email: "coach@example.com" });
    const req = makeRequest({ sessionId: SESSION_ID, token });

    attachVisitor(req, makeResponse().response, jest.fn());

    expect(req.user).toMatchObject({ id: 3, role: "user", email: "coach@example.com" });
  });

  it("ignores an invalid token", () => {
    const req = makeRequest({ sessionId: SESSION_ID, token: "garbage" });
    const next = jest.fn();

    attachVisitor(req, makeResponse().response, next);

    expect(req.user).toBeUndefined();
    expect(next).toHaveBeenCalled();
  });
});

describe("loadVisitorState", () => {
  it("loads the visitor before continuing", async () => {
    const state = { sessionId: SESSION_ID, cart: [1], language: "de", modified: false };
    mockLoadVisitor.mockImplementation(async () => state);
    const req = makeRequest();
    req.sessionId = SESSION_ID;
    const next = jest.fn();

    await loadVisitorState(req, makeResponse().response, next);

    expect(mockLoadVisitor).toHaveBeenCalledWith(SESSION_ID);
    expect(req.visitor).toBe(state);
    expect(next).toHaveBeenCalled();
  });

  it("answers 500 when the store fails", async () => {
    mockLoadVisitor.mockImplementation(async () => {
      throw new Error("store down");
    });
    const req = makeRequest();
    req.sessionId = SESSION_ID;
    const { res, response } = makeResponse();
    const next = jest.fn();

    await loadVisitorState(req, response, next);

    expect(res.status).toHaveBeenCalledWith(500);
    expect(next).not.toHaveBeenCalled();
  });
});
