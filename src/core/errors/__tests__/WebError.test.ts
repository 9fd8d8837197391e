import { WebError, WebErrorCode } from "../WebError";

describe("WebError", () => {
  describe("constructor", () => {
    it("should create error with message and default code", () => {
      const error = new WebError("Test error");
      expect(error.message).toBe("Test error");
      expect(error.code).toBe(WebErrorCode.UNKNOWN);
      expect(error.recoverable).toBe(false);
      expect(error.statusCode).toBeUndefined();
    });

    it("should create error with all parameters", () => {
      const error = new WebError(
        "Test error",
        WebErrorCode.NOT_FOUND,
        true,
        { resource: "test" },
        404,
      );
      expect(error.code).toBe(WebErrorCode.NOT_FOUND);
      expect(error.recoverable).toBe(true);
      expect(error.statusCode).toBe(404);
    });
  });

  describe("static factory methods", () => {
    it("serverStartFailed should carry the port and original error", () => {
      const error = WebError.serverStartFailed(3000, new Error("EACCES"));

      expect(error.message).toBe(
        "Failed to start web server on port 3000: EACCES",
      );
      expect(error.code).toBe(WebErrorCode.SERVER_START_FAILED);
      expect(error.statusCode).toBe(500);
    });

    it("serverStopFailed should carry the original error", () => {
      const error = WebError.serverStopFailed(new Error("busy"));

      expect(error.message).toBe("Failed to stop web server: busy");
      expect(error.code).toBe(WebErrorCode.SERVER_STOP_FAILED);
    });

    it("portInUse should name the port", () => {
      const error = WebError.portInUse(8080);

      expect(error.message).toBe("Port 8080 is already in use");
      expect(error.code).toBe(WebErrorCode.PORT_IN_USE);
    });

    it("serverNotRunning should map to 503", () => {
      const error = WebError.serverNotRunning();

      expect(error.code).toBe(WebErrorCode.SERVER_NOT_RUNNING);
      expect(error.statusCode).toBe(503);
    });

    it("notFound should name the resource", () => {
      const error = WebError.notFound("GET /api/nothing");

      expect(error.message).toBe("Resource not found: GET /api/nothing");
      expect(error.code).toBe(WebErrorCode.NOT_FOUND);
      expect(error.statusCode).toBe(404);
    });
  });

  describe("toJSON", () => {
    it("should include the status code", () => {
      const json = WebError.notFound("/x").toJSON();

      expect(json.code).toBe(WebErrorCode.NOT_FOUND);
      expect(json.statusCode).toBe(404);
      expect(json.name).toBe("WebError");
    });
  });

  describe("getUserMessage", () => {
    it("should return user message for PORT_IN_USE", () => {
      expect(WebError.portInUse(80).getUserMessage()).toBe(
        "Web interface port is already in use. Please change the port.",
      );
    });
  });
});
