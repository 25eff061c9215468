import { describe, it, expect, vi, beforeEach } from "vitest";
import { Request, Response, NextFunction } from "express";
import { addSecurityHeaders, cors } from "../middleware/security";

describe("Security Middleware", () => {
    let mockReq: Partial<Request>;
    let mockRes: {
        setHeader: ReturnType<typeof vi.fn>;
        status: ReturnType<typeof vi.fn>;
        end: ReturnType<typeof vi.fn>;
    };
    let mockNext: NextFunction;
    let headers: Record<string, string>;

    beforeEach(() => {
        headers = {};
        const get = vi.fn();
        get.mockImplementation((name: string) => headers[name]);
        mockReq = {
            method: "POST",
            path: "/api/chat",
            get,
        };
        mockRes = {
            setHeader: vi.fn(),
            status: vi.fn().mockReturnThis(),
            end: vi.fn(),
        };
        mockNext = vi.fn();
    });

    function res(): Response {
        return mockRes as Partial<Response> as Response;
    }

    describe("addSecurityHeaders", () => {
        it("should add all required security headers", () => {
            addSecurityHeaders(mockReq as Request, res(), mockNext);

            expect(mockRes.setHeader).toHaveBeenCalledWith("X-Frame-Options", "DENY");
            expect(mockRes.setHeader).toHaveBeenCalledWith("X-Content-Type-Options", "nosniff");
            expect(mockRes.setHeader).toHaveBeenCalledWith("Referrer-Policy", "strict-origin-when-cross-origin");
            expect(mockRes.setHeader).toHaveBeenCalledWith(
                "Content-Security-Policy",
                "default-src 'none'; frame-ancestors 'none'",
            );
            expect(mockNext).toHaveBeenCalled();
        });
    });

    describe("cors", () => {
        it("should allow any origin without credentials for *", () => {
            cors("*")(mockReq as Request, res(), mockNext);

            expect(mockRes.setHeader).toHaveBeenCalledWith("Access-Control-Allow-Origin", "*");
            expect(mockRes.setHeader).not.toHaveBeenCalledWith("Access-Control-Allow-Credentials", "true");
            expect(mockNext).toHaveBeenCalled();
        });

        it("should echo the configured origin with credentials", () => {
            headers.Origin = "http://localhost:5173";

            cors("http://localhost:5173")(mockReq as Request, res(), mockNext);

            expect(mockRes.setHeader).toHaveBeenCalledWith("Access-Control-Allow-Origin", "http://localhost:5173");
            expect(mockRes.setHeader).toHaveBeenCalledWith("Access-Control-Allow-Credentials", "true");
        });

        it("should not allow other origins", () => {
            headers.Origin = "https://elsewhere.example.test";

            cors("http://localhost:5173")(mockReq as Request, res(), mockNext);

            const allowOrigin = mockRes.setHeader.mock.calls.filter(([name]) => name === "Access-Control-Allow-Origin");
            expect(allowOrigin).toEqual([]);
            expect(mockNext).toHaveBeenCalled();
        });

        it("should expose and allow the session header", () => {
            cors("*")(mockReq as Request, res(), mockNext);

            expect(mockRes.setHeader).toHaveBeenCalledWith("Access-Control-Expose-Headers", "X-Session-Id");
            expect(mockRes.setHeader).toHaveBeenCalledWith(
                "Access-Control-Allow-Headers",
                "Accept, Authorization, Content-Type, X-Requested-With, X-Session-Id",
            );
        });

        it("should answer preflight requests with 204", () => {
            mockReq.method = "OPTIONS";

            cors("*")(mockReq as Request, res(), mockNext);

            expect(mockRes.status).toHaveBeenCalledWith(204);
            expect(mockRes.end).toHaveBeenCalled();
            expect(mockNext).not.toHaveBeenCalled();
        });
    });
});
