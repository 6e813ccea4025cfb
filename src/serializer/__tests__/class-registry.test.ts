import { describe, it, expect, beforeEach } from "@jest/globals";
import { ErrorKind, serialError } from "../../errors";
import { ClassRegistry } from "../class-registry";
import { Serializer } from "../Serializer";
import { t } from "../value-types";
import { recordOf } from "./helpers";

class Shape {
  name = "";
}

class Circle extends Shape {
  radius = 0;
}

class Square extends Shape {
  side = 0;
}

class Labelled {
  label = "";
}

/** Holds its label part instead of inheriting it. */
class Badge {
  readonly tag = new Labelled();
  level = 0;
}

abstract class Entity {
  id = 0;
}

abstract class Named {
  name = "";
}

abstract class Dated {
  year = 0;
}

/** Reaches Entity through both Named and Dated. */
class Release {
  id = 0;
  name = "";
  year = 0;
}

describe("ClassRegistry", () => {
  let registry: ClassRegistry;

  beforeEach(() => {
    registry = new ClassRegistry();
  });

  it("registers classes and finds them by name, type and instance", () => {
    const shape = registry.defineAbstract("Shape", Shape).field("name", t.string());
    const circle = registry
      .define("Circle", Circle)
      .extends(Shape)
      .field("radius", t.float());

    expect(registry.lookupByName("Circle")).toBe(circle);
    expect(registry.lookupByRuntimeType(Shape)).toBe(shape);
    expect(registry.lookupByInstance(new Circle())).toBe(circle);
    expect(registry.names).toEqual(["Shape", "Circle"]);
    expect(shape.abstract).toBe(true);
    expect(circle.abstract).toBe(false);
    expect(circle.superclasses).toEqual([shape]);
    expect(circle.memberNames).toEqual(["radius"]);
  });

  it("does not find unregistered subclasses by instance", () => {
    registry.define("Shape", Shape);
    expect(registry.lookupByInstance(new Square())).toBeUndefined();
    expect(registry.lookupByInstance(Object.create(null))).toBeUndefined();
  });

  it("constructs through the registered factory", () => {
    const circle = registry.defineWith("Circle", Circle, () => {
      const created = new Circle();
      created.radius = 5;
      return created;
    });
    const made = circle.construct();
    expect(made).toBeInstanceOf(Circle);
    expect(made?.radius).toBe(5);
    expect(registry.defineAbstract("Shape", Shape).construct()).toBeUndefined();
  });

  it("rejects a second class under the same name", () => {
    registry.define("Circle", Circle);
    expect(recordOf(() => registry.define("Circle", Square))).toEqual({
      kind: ErrorKind.RedefinedClass,
      fatal: true,
      where: "register()",
      arg: "'Circle'",
      source: "",
      line: 0,
    });
  });

  it("rejects a type registered twice", () => {
    registry.define("Circle", Circle);
    expect(recordOf(() => registry.define("Round", Circle)).arg).toBe(
      "'Round' (Circle is already registered as 'Circle')",
    );
  });

  it("rejects empty and marker class names", () => {
    expect(recordOf(() => registry.define("", Circle))).toMatchObject({
      kind: ErrorKind.WrongKeyword,
      arg: "''",
    });
    expect(recordOf(() => registry.define("@Circle", Circle))).toMatchObject({
      kind: ErrorKind.WrongKeyword,
      arg: "'@Circle'",
    });
  });

  it("rejects duplicate and marker member names", () => {
    const circle = registry.define("Circle", Circle).field("radius", t.float());
    expect(recordOf(() => circle.field("radius", t.float()))).toEqual({
      kind: ErrorKind.RedefinedMember,
      fatal: true,
      where: "member()",
      arg: "'radius' in class 'Circle'",
      source: "",
      line: 0,
    });
    expect(
      recordOf(() => circle.field("name", t.string(), { name: "@id" })),
    ).toMatchObject({
      kind: ErrorKind.WrongKeyword,
      arg: "'@id' in class 'Circle'",
    });
  });

  it("rejects unknown and repeated superclasses", () => {
    const definition = registry.define("Square", Square);
    expect(recordOf(() => definition.extends(Shape))).toEqual({
      kind: ErrorKind.UnknownSuperclass,
      fatal: true,
      where: "extends()",
      arg: "'Shape' for class 'Square'",
      source: "",
      line: 0,
    });

    registry.defineAbstract("Shape", Shape);
    definition.extends(Shape);
    expect(recordOf(() => definition.extends(Shape))).toMatchObject({
      kind: ErrorKind.RedefinedSuperclass,
      arg: "'Shape' for class 'Square'",
    });
  });

  it("rejects a class as its own superclass", () => {
    const circle = registry.define("Circle", Circle);
    expect(recordOf(() => circle.extends(Circle)).kind).toBe(
      ErrorKind.RedefinedSuperclass,
    );
  });

  it("fails to require a class that was never registered", () => {
    expect(recordOf(() => registry.require(Circle))).toMatchObject({
      kind: ErrorKind.UnknownClass,
      where: "lookup",
      arg: "'Circle'",
    });
  });

  it("follows superclass links in inherits and conforms", () => {
    const shape = registry.defineAbstract("Shape", Shape);
    const circle = registry.define("Circle", Circle).extends(Shape);
    const square = registry.define("Square", Square).extends(Shape);
    registry.define("Labelled", Labelled);
    registry
      .define("Badge", Badge)
      .extends(Labelled, (badge) => badge.tag);

    expect(registry.inherits(circle, shape)).toBe(true);
    expect(registry.inherits(circle, square)).toBe(false);
    expect(registry.conforms(new Circle(), Shape)).toBe(true);
    expect(registry.conforms(new Badge(), Labelled)).toBe(true);
    expect(registry.conforms(new Badge(), Shape)).toBe(false);
    expect(registry.conforms("Badge", Labelled)).toBe(false);
  });

  it("writes a superclass shared by two superclasses once", () => {
    registry.defineAbstract("Entity", Entity).field("id", t.int());
    registry.defineAbstract("Named", Named).extends(Entity).field("name", t.string());
    registry.defineAbstract("Dated", Dated).extends(Entity).field("year", t.int());
    registry.define("Release", Release).extends(Named).extends(Dated);
    const serializer = new Serializer(registry, { onError: () => undefined });
    const release = new Release();
    release.id = 1;
    release.name = "alpha";
    release.year = 2;

    const text = serializer.stringify(Release, release);
    expect(text).toBe('{\n  "id": 1,\n  "name": "alpha",\n  "year": 2\n}\n');
    expect(serializer.parse(Release, text)).toEqual(release);
  });

  it("errors carry a remediation hint", () => {
    try {
      registry.require(Circle);
    } catch (error) {
      expect(serialError.is(error)).toBe(true);
      if (serialError.is(error)) {
        expect(serialError.toString(error)).toBe(
          "Error in lookup:\n- Unknown class 'Circle'\n\n" +
            "Remediation: Register the class with ClassRegistry.define() before reading or writing it.",
        );
      }
    }
    expect.assertions(2);
  });
});
