import { describe, test, expect } from "vitest";

import { compile, completed, errorsOf, failed, importOf, leaf, s, statementOf, yangModule } from "./_helpers/yang.js";

describe("type and typedef", () => {
  test("built-in types resolve without a lookup", () => {
    const result = completed(compile([yangModule("m", "m", leaf("x", "string"))]));
    expect(statementOf(result.schema, "m", "leaf x", "type")?.data).toEqual({ name: "string", builtin: true });
  });

  test("a typedef declared after its use resolves", () => {
    const result = completed(
      compile([yangModule("m", "m", leaf("x", "percent"), s("typedef", "percent", s("type", "uint8")))]),
    );
    expect(statementOf(result.schema, "m", "leaf x", "type")?.data).toEqual({ name: "percent", module: "m@unspecified" });
  });

  test("the module's own prefix refers to local typedefs", () => {
    const result = completed(
      compile([yangModule("m", "m", s("typedef", "percent", s("type", "uint8")), leaf("x", "m:percent"))]),
    );
    expect(statementOf(result.schema, "m", "leaf x", "type")?.data).toEqual({ name: "percent", module: "m@unspecified" });
  });

  test("nested statements see typedefs of enclosing scopes", () => {
    const result = completed(
      compile([
        yangModule("m", "m", s("container", "c", s("container", "d", leaf("z", "outer"))), s("typedef", "outer", s("type", "string"))),
      ]),
    );
    expect(statementOf(result.schema, "m", "container c", "container d", "leaf z", "type")?.data).toEqual({
      name: "outer",
      module: "m@unspecified",
    });
  });

  test("a typedef inside a container is not visible outside it", () => {
    const result = failed(
      compile([yangModule("m", "m", s("container", "c", s("typedef", "inner", s("type", "string"))), leaf("y", "inner"))]),
    );
    expect(result.failedStage).toBe("full-declaration");
    expect(errorsOf(result)).toEqual([
      ["UnresolvedPrerequisite", "full-declaration", "typedef 'inner' was not found [at m.yang:8:5]"],
    ]);
  });

  test("an unknown typedef in an imported module is reported at the use", () => {
    const base = yangModule("base", "b");
    const app = yangModule("app", "a", importOf("base", "bs"), leaf("x", "bs:nope"));
    const result = failed(compile([base, app]));
    expect(errorsOf(result)).toEqual([
      ["UnresolvedPrerequisite", "full-declaration", "typedef 'bs:nope' was not found [at app.yang:7:5]"],
    ]);
  });

  test("a typedef may not refer to itself", () => {
    const result = failed(compile([yangModule("m", "m", s("typedef", "loop", s("type", "loop")))]));
    expect(errorsOf(result)).toEqual([
      ["SourceError", "full-declaration", "Typedef 'loop' refers to itself [at m.yang:5:5]"],
    ]);
  });

  test("a typedef may not redefine a built-in type", () => {
    const result = failed(compile([yangModule("m", "m", s("typedef", "string", s("type", "uint8")))]));
    expect(result.failedStage).toBe("build");
    expect(errorsOf(result)).toEqual([
      ["InvalidArgument", "build", "Typedef may not redefine built-in type 'string' [at m.yang:4:3]"],
    ]);
  });

  test("two typedefs with one name in one scope collide at the second", () => {
    const result = failed(
      compile([yangModule("m", "m", s("typedef", "t", s("type", "string")), s("typedef", "t", s("type", "uint8")))]),
    );
    expect(result.failedStage).toBe("statement-definition");
    expect(errorsOf(result)).toEqual([
      ["DuplicateDefinition", "statement-definition", "Typedef 't' is already defined in 'module m' [at m.yang:6:3]"],
    ]);
  });

  test("a nested typedef may reuse a name of an enclosing scope", () => {
    const result = completed(
      compile([
        yangModule(
          "m",
          "m",
          s("typedef", "t", s("type", "string")),
          s("container", "c", s("typedef", "t", s("type", "uint8")), leaf("x", "t")),
        ),
      ]),
    );
    expect(statementOf(result.schema, "m", "container c", "leaf x", "type")?.data).toEqual({
      name: "t",
      module: "m@unspecified",
    });
  });

  test("a typedef needs a type", () => {
    const result = failed(compile([yangModule("m", "m", s("typedef", "t"))]));
    expect(errorsOf(result)).toEqual([["SubstatementValidation", "build", "Missing 'type' substatement in 'typedef'"]]);
  });
});
