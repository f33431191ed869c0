import { stat } from "node:fs/promises";
import { runInNewContext } from "node:vm";
import { errnoCode, errorMessage, faultFromError } from "../errors.js";

describe("faultFromError", () => {
  test("keeps name, message and errno code of a filesystem error", async () => {
    const err: unknown = await stat("/nonexistent/medic-test").catch((e: unknown) => e);
    const fault = faultFromError(err);
    expect(fault.name).toBe("Error");
    expect(fault.code).toBe("ENOENT");
    expect(fault.message.startsWith("ENOENT: no such file or directory")).toBe(true);
  });

  test("errors created in another realm keep their code", () => {
    const foreign: unknown = runInNewContext(
      'Object.assign(new Error("EACCES: permission denied"), { code: "EACCES" })',
    );
    expect(foreign instanceof Error).toBe(false);
    expect(faultFromError(foreign)).toEqual({
      name: "Error",
      message: "EACCES: permission denied",
      code: "EACCES",
    });
    expect(errorMessage(foreign)).toBe("EACCES: permission denied");
    expect(errnoCode(foreign)).toBe("EACCES");
  });

  test("non-error values become a generic fault", () => {
    expect(faultFromError("disk on fire")).toEqual({ name: "Error", message: "disk on fire" });
    expect(faultFromError(new TypeError("bad"))).toEqual({ name: "TypeError", message: "bad" });
  });
});
