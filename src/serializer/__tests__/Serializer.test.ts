import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ErrorKind, invalidOptionsError, SerialErrorRecord } from "../../errors";
import { Logger } from "../../models/Logger";
import { LogPrinter } from "../../models/LogPrinter";
import { ClassRegistry } from "../class-registry";
import { Serializer } from "../Serializer";
import { Syntax } from "../syntax";
import type { Slot } from "../types";
import { t } from "../value-types";
import { recordOf } from "./helpers";

class Point {
  constructor(
    public x = 0,
    public y = 0,
  ) {}
}

class Segment {
  from = new Point();
  to = new Point();
}

abstract class Animal {
  name = "";
}

class Dog extends Animal {
  breed = "";
}

class Cat extends Animal {
  lives = 9;
}

class Zoo {
  animals: Array<Animal | null> = [];
  keeper: Animal | null = null;
}

/** Not a subclass of Named in TypeScript; linked only in the registry. */
class Named {
  name = "";
}

class Employee {
  name = "";
  salary = 0;
}

class Team {
  lead: Named | null = null;
}

class Labelled {
  label = "";
}

class Badge {
  readonly tag = new Labelled();
  level = 0;
}

class Note {
  text = "";
}

const POINT_TEXT = '{\n  "x": 3,\n  "y": 4\n}\n';

const createRegistry = (): ClassRegistry => {
  const registry = new ClassRegistry();
  registry.define("Point", Point).field("x", t.int()).field("y", t.int());
  registry
    .define("Segment", Segment)
    .field("from", t.object(Point))
    .field("to", t.object(Point));
  registry.defineAbstract("Animal", Animal).field("name", t.string());
  registry.define("Dog", Dog).extends(Animal).field("breed", t.string());
  registry.define("Cat", Cat).extends(Animal).field("lives", t.int());
  registry
    .define("Zoo", Zoo)
    .field("animals", t.array(t.owned(Animal)))
    .field("keeper", t.ref(Animal));
  registry.define("Named", Named).field("name", t.string());
  registry.define("Employee", Employee).extends(Named).field("salary", t.int());
  registry.define("Team", Team).field("lead", t.owned(Named));
  registry.define("Labelled", Labelled).field("label", t.string());
  registry.define("Note", Note).field("text", t.string());
  registry
    .define("Badge", Badge)
    .extends(Labelled, (badge) => badge.tag)
    .field("level", t.int());
  return registry;
};

describe("Serializer", () => {
  let registry: ClassRegistry;
  let records: SerialErrorRecord[];
  let serializer: Serializer;

  beforeEach(() => {
    registry = createRegistry();
    records = [];
    serializer = new Serializer(registry, {
      onError: (record) => records.push(record),
    });
  });

  describe("objects", () => {
    it("writes an object with its members in declaration order", () => {
      expect(serializer.stringify(Point, new Point(3, 4))).toBe(POINT_TEXT);
    });

    it("reads an object back", () => {
      const point = serializer.parse(Point, POINT_TEXT);
      expect(point).toBeInstanceOf(Point);
      expect(point).toEqual(new Point(3, 4));
    });

    it("nests embedded objects", () => {
      const segment = new Segment();
      segment.from = new Point(1, 2);
      segment.to = new Point(5, 6);
      const text = serializer.stringify(Segment, segment);
      expect(text).toBe(
        [
          "{",
          '  "from": {',
          '    "x": 1,',
          '    "y": 2',
          "  },",
          '  "to": {',
          '    "x": 5,',
          '    "y": 6',
          "  }",
          "}",
          "",
        ].join("\n"),
      );
      expect(serializer.parse(Segment, text)).toEqual(segment);
    });

    it("writes @class when the runtime class differs", () => {
      const dog = new Dog();
      dog.name = "Rex";
      dog.breed = "Collie";
      const cat = new Cat();
      cat.name = "Tom";
      cat.lives = 7;
      const zoo = new Zoo();
      zoo.animals = [dog, cat];

      const text = serializer.stringify(Zoo, zoo);
      expect(text).toBe(
        [
          "{",
          '  "animals": [',
          "    {",
          '      "@class": "Dog",',
          '      "name": "Rex",',
          '      "breed": "Collie"',
          "    },",
          "    {",
          '      "@class": "Cat",',
          '      "name": "Tom",',
          '      "lives": 7',
          "    }",
          "  ],",
          '  "keeper": null',
          "}",
          "",
        ].join("\n"),
      );

      const copy = serializer.parse(Zoo, text);
      expect(copy.animals[0]).toBeInstanceOf(Dog);
      expect(copy.animals[1]).toBeInstanceOf(Cat);
      expect(copy).toEqual(zoo);
    });

    it("reads members of a superclass linked only in the registry", () => {
      const lead = new Employee();
      lead.name = "Ada";
      lead.salary = 10;
      const team = new Team();
      team.lead = lead;

      const text = serializer.stringify(Team, team);
      expect(text).toBe(
        [
          "{",
          '  "lead": {',
          '    "@class": "Employee",',
          '    "name": "Ada",',
          '    "salary": 10',
          "  }",
          "}",
          "",
        ].join("\n"),
      );
      const copy = serializer.parse(Team, text);
      expect(copy.lead).toBeInstanceOf(Employee);
      expect(copy.lead).toEqual(lead);
    });

    it("reaches superclass members through an upcast", () => {
      const badge = new Badge();
      badge.tag.label = "gold";
      badge.level = 3;

      const text = serializer.stringify(Badge, badge);
      expect(text).toBe('{\n  "label": "gold",\n  "level": 3\n}\n');
      const copy = serializer.parse(Badge, text);
      expect(copy.tag.label).toBe("gold");
      expect(copy.level).toBe(3);
    });

    it("writes empty containers and null pointers compactly", () => {
      expect(serializer.stringify(Zoo, new Zoo())).toBe(
        '{\n  "animals": [],\n  "keeper": null\n}\n',
      );
    });

    it("reads into the object already in the slot", () => {
      const existing = new Point(1, 1);
      const slot: Slot<Point> = { value: existing };
      expect(serializer.read(slot, Point, { text: '{"x": 8}' })).toBe(true);
      expect(slot.value).toBe(existing);
      expect(existing).toEqual(new Point(8, 1));
    });

    it("skips unknown members and reports them as warnings", () => {
      const slot: Slot<Point> = {};
      const ok = serializer.read(slot, Point, {
        text: '{"x": 1, "z": {"a": [1, {"b": 2}]}, "y": 2}',
        name: "points.json",
      });
      expect(ok).toBe(true);
      expect(slot.value).toEqual(new Point(1, 2));
      expect(records).toEqual([
        {
          kind: ErrorKind.UnknownMember,
          fatal: false,
          where: "read",
          arg: "'z' in class 'Point'",
          source: "points.json",
          line: 1,
        },
      ]);
      expect(serializer.getLastError()).toEqual(records[0]);
    });
  });

  describe("errors", () => {
    it("rejects an abstract class without @class", () => {
      expect(recordOf(() => serializer.parse(Animal, '{"name": "x"}'))).toEqual({
        kind: ErrorKind.AbstractClass,
        fatal: true,
        where: "read",
        arg: "'Animal'",
        source: "<string>",
        line: 1,
      });
    });

    it("rejects unknown and unrelated classes", () => {
      expect(
        recordOf(() => serializer.parse(Animal, '{"@class": "Bird"}')).arg,
      ).toBe('"Bird"');
      expect(
        recordOf(() => serializer.parse(Animal, '{"@class": "Point"}')).arg,
      ).toBe("'Point' is not a 'Animal'");
    });

    it("accepts @class only as the first member", () => {
      expect(
        recordOf(() => serializer.parse(Point, '{"x": 1, "@class": "Point"}')),
      ).toMatchObject({
        kind: ErrorKind.WrongKeyword,
        arg: "'@class' must be the first member",
      });
    });

    it("rejects other keys that start with @", () => {
      expect(
        recordOf(() => serializer.parse(Point, '{"@type": "Point"}')),
      ).toMatchObject({ kind: ErrorKind.WrongKeyword, arg: '"@type"' });
    });

    it("names the member holding an invalid value", () => {
      const text = '{\n  "x": 1,\n  "y": "bad"\n}';
      expect(recordOf(() => serializer.parse(Point, text))).toEqual({
        kind: ErrorKind.InvalidValue,
        fatal: true,
        where: "read",
        arg: "\"bad\" for member 'y'",
        source: "<string>",
        line: 4,
      });
    });

    it("rejects unknown back-references and malformed ids", () => {
      expect(
        recordOf(() =>
          serializer.parse(Segment, '{"from": "@5", "to": {"x": 1, "y": 1}}'),
        ),
      ).toMatchObject({ kind: ErrorKind.InvalidID, arg: '"@5"' });
      expect(
        recordOf(() => serializer.parse(Point, '{"@id": "one"}')),
      ).toMatchObject({ kind: ErrorKind.InvalidID, arg: '"one"' });
    });

    it("reports empty input", () => {
      expect(recordOf(() => serializer.parse(Point, "  // nothing\n"))).toMatchObject({
        kind: ErrorKind.NoData,
        line: 2,
      });
    });

    it("reports structural mistakes", () => {
      expect(recordOf(() => serializer.parse(Point, "[1]")).kind).toBe(
        ErrorKind.ExpectingBrace,
      );
      expect(recordOf(() => serializer.parse(Point, '{"x": 1')).kind).toBe(
        ErrorKind.PrematureEOF,
      );
      expect(recordOf(() => serializer.parse(Point, '{"x": 1]')).arg).toBe(
        "'}' before ']'",
      );
      expect(recordOf(() => serializer.parse(Point, '{"x": 1,, "y": 2}')).kind).toBe(
        ErrorKind.ExpectingPairOrBrace,
      );
    });

    it("returns false from read and leaves the slot alone", () => {
      const slot: Slot<Point> = {};
      expect(serializer.read(slot, Point, { text: '{"x": true}' })).toBe(false);
      expect(slot.value).toBeUndefined();
      expect(serializer.getLastError()).toMatchObject({
        kind: ErrorKind.InvalidValue,
        arg: "'true' for member 'x'",
      });
      expect(records).toHaveLength(1);
    });

    it("clears the last error on the next call", () => {
      serializer.read({}, Point, { text: "{" });
      expect(serializer.getLastError()).not.toBeNull();
      serializer.read({}, Point, { text: "{}" });
      expect(serializer.getLastError()).toBeNull();
    });

    it("rejects writing a class that is not registered", () => {
      class Unknown {
        value = 1;
      }
      expect(recordOf(() => serializer.stringify(Unknown, new Unknown()))).toEqual({
        kind: ErrorKind.UnknownClass,
        fatal: true,
        where: "write",
        arg: "'Unknown'",
        source: "<string>",
        line: 1,
      });
    });
  });

  describe("options", () => {
    it("has defaults", () => {
      expect(serializer.getSharing()).toBe(false);
      expect(serializer.getSyntax()).toBe(Syntax.Comments);
      expect(serializer.getIndent()).toEqual({ char: " ", count: 2 });
      expect(serializer.getRegistry()).toBe(registry);
    });

    it("indents with the configured character", () => {
      const tabs = new Serializer(registry, { indent: { char: "\t", count: 1 } });
      expect(tabs.stringify(Point, new Point(3, 4))).toBe(
        '{\n\t"x": 3,\n\t"y": 4\n}\n',
      );
      tabs.setIndent(" ", 0);
      expect(tabs.stringify(Point, new Point(3, 4))).toBe(
        '{\n"x": 3,\n"y": 4\n}\n',
      );
    });

    it("rejects invalid options", () => {
      expect(
        () => new Serializer(registry, { indent: { char: "ab", count: 1 } }),
      ).toThrow("Invalid serializer options: indent.char: ");
      expect(() => serializer.setSyntax(99)).toThrow(
        "Invalid serializer options: ",
      );
      expect(() => serializer.setIndent(" ", -1)).toThrow(
        "Invalid serializer options: count: ",
      );
      try {
        serializer.setSyntax(-1);
      } catch (error) {
        expect(invalidOptionsError.is(error)).toBe(true);
      }
      expect(serializer.getSyntax()).toBe(Syntax.Comments);
    });

    it("reads relaxed syntax when enabled", () => {
      const text = "{\n  x: 1 // one\n  y: 2\n}";
      expect(recordOf(() => serializer.parse(Point, text))).toMatchObject({
        kind: ErrorKind.ExpectingString,
        arg: "'x'",
      });
      serializer.setSyntax(Syntax.Relaxed);
      expect(serializer.parse(Point, text)).toEqual(new Point(1, 2));
    });
  });

  describe("syntax flags", () => {
    const withSyntax = (syntax: number) =>
      new Serializer(registry, { syntax, onError: () => undefined });

    it("reads pairs separated by spaces with NoQuotes and NoCommas", () => {
      const relaxed = withSyntax(Syntax.NoQuotes | Syntax.NoCommas);
      expect(relaxed.parse(Point, "{ x: 3 y: 4 }")).toEqual(new Point(3, 4));
      expect(
        recordOf(() => withSyntax(Syntax.NoQuotes).parse(Point, "{ x: 3 y: 4 }")),
      ).toMatchObject({
        kind: ErrorKind.InvalidValue,
        arg: "'3 y: 4' for member 'x'",
      });
    });

    it("keeps unquoted values whole with NoQuotes alone", () => {
      const unquoted = withSyntax(Syntax.NoQuotes);
      expect(unquoted.parse(Note, "{ text: 10 am }").text).toBe("10 am");
      expect(unquoted.parse(Note, "{ text: true love }").text).toBe("true love");
    });

    it("needs NoCommas for newline-separated pairs", () => {
      const text = '{\n  "x": 3\n  "y": 4\n}';
      expect(withSyntax(Syntax.NoCommas).parse(Point, text)).toEqual(
        new Point(3, 4),
      );
      for (const syntax of [
        Syntax.Strict,
        Syntax.Comments,
        Syntax.Newlines,
        Syntax.Comments | Syntax.Newlines,
      ]) {
        expect(recordOf(() => withSyntax(syntax).parse(Point, text))).toMatchObject({
          kind: ErrorKind.ExpectingComma,
          line: 3,
        });
      }
    });

    it("needs NoQuotes for unquoted names", () => {
      const text = "{ x: 3, y: 4 }";
      expect(withSyntax(Syntax.NoQuotes).parse(Point, text)).toEqual(
        new Point(3, 4),
      );
      for (const syntax of [
        Syntax.Strict,
        Syntax.Comments,
        Syntax.NoCommas,
        Syntax.Newlines,
        Syntax.Comments | Syntax.NoCommas | Syntax.Newlines,
      ]) {
        expect(recordOf(() => withSyntax(syntax).parse(Point, text))).toMatchObject({
          kind: ErrorKind.ExpectingString,
          arg: "'x'",
        });
      }
    });

    it("needs Comments for comments", () => {
      const text = '{ "x": 3, // first\n "y": 4 }';
      expect(withSyntax(Syntax.Comments).parse(Point, text)).toEqual(
        new Point(3, 4),
      );
      expect(
        recordOf(() => withSyntax(Syntax.Strict).parse(Point, text)).kind,
      ).toBe(ErrorKind.ExpectingString);
    });

    it("needs Newlines for line breaks inside strings", () => {
      const text = '{ "text": "two\nlines" }';
      expect(withSyntax(Syntax.Newlines).parse(Note, text).text).toBe(
        "two\nlines",
      );
      expect(
        recordOf(() => withSyntax(Syntax.Strict).parse(Note, text)).kind,
      ).toBe(ErrorKind.InvalidCharacter);
    });
  });

  describe("default logging", () => {
    let logs: string[];
    let errs: string[];

    beforeEach(() => {
      logs = [];
      errs = [];
      LogPrinter.setWriters({
        log: (line) => logs.push(line),
        error: (line) => errs.push(line),
      });
    });

    afterEach(() => {
      LogPrinter.resetWriters();
    });

    it("logs warnings and errors when no handler is given", () => {
      const logged = new Serializer(registry, {
        logger: new Logger({ printThreshold: "info", printStrategy: "plain" }),
      });
      logged.parse(Point, '{"x": 1, "z": 2, "y": 3}');
      expect(errs).toEqual([
        "WARN [jsonweave] Error while reading '<string>' at or before line 1:\n- Unknown member 'z' in class 'Point'",
        "    ╰─ data:",
        "       {",
        '         "kind": "UnknownMember"',
        "       }",
      ]);

      errs.length = 0;
      expect(logged.read({}, Point, { text: "{", name: "a.json" })).toBe(false);
      expect(errs[0]).toBe(
        "ERROR [jsonweave] Error while reading 'a.json' at or before line 1:\n- Premature end of file in object",
      );
      expect(logs).toEqual([]);
    });

    it("logs a debug line per read and write", () => {
      const logged = new Serializer(registry, {
        logger: new Logger({ printThreshold: "debug", printStrategy: "plain" }),
      });
      logged.read({}, Point, { text: POINT_TEXT });
      expect(logs[0]).toBe("DEBUG [jsonweave] Read '<string>'");
      expect(logs.slice(2)).toEqual([
        "       {",
        '         "objects": 1,',
        '         "ids": 0',
        "       }",
      ]);
    });
  });

  describe("files and streams", () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), "jsonweave-"));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it("writes to and reads from a file", () => {
      const path = join(dir, "point.json");
      expect(serializer.write(new Point(3, 4), Point, { path })).toBe(true);
      expect(readFileSync(path, "utf8")).toBe(POINT_TEXT);

      const slot: Slot<Point> = {};
      expect(serializer.read(slot, Point, { path })).toBe(true);
      expect(slot.value).toEqual(new Point(3, 4));
    });

    it("skips a byte order mark", () => {
      const path = join(dir, "bom.json");
      writeFileSync(path, `\uFEFF${POINT_TEXT}`, "utf8");
      const slot: Slot<Point> = {};
      expect(serializer.read(slot, Point, { path })).toBe(true);
      expect(slot.value).toEqual(new Point(3, 4));
    });

    it("reports a file that cannot be read", () => {
      const path = join(dir, "missing.json");
      expect(serializer.read({}, Point, { path })).toBe(false);
      const record = serializer.getLastError();
      expect(record).toMatchObject({
        kind: ErrorKind.CantReadFile,
        fatal: true,
        where: "read",
        source: path,
        line: 0,
      });
      expect(record?.arg.startsWith(`'${path}': ENOENT`)).toBe(true);
    });

    it("reports errors with the file name and line", () => {
      const path = join(dir, "bad.json");
      writeFileSync(path, '{\n  "x": 1,\n  "y": false\n}\n', "utf8");
      expect(serializer.read({}, Point, { path })).toBe(false);
      expect(records[0]).toMatchObject({ source: path, line: 4 });
    });

    it("writes to a stream", () => {
      const chunks: string[] = [];
      const stream = { write: (chunk: string) => chunks.push(chunk) };
      expect(serializer.write(new Point(3, 4), Point, { stream })).toBe(true);
      expect(chunks.join("")).toBe(POINT_TEXT);
    });

    it("reports a stream that fails", () => {
      const stream = {
        write: (): never => {
          throw new Error("disk full");
        },
      };
      expect(serializer.write(new Point(3, 4), Point, { stream })).toBe(false);
      expect(records).toEqual([
        {
          kind: ErrorKind.CantWriteFile,
          fatal: true,
          where: "write",
          arg: "'<stream>': disk full",
          source: "<stream>",
          line: 1,
        },
      ]);
    });

    it("rethrows errors that are not serial errors", () => {
      class Hooked {}
      registry.define("Hooked", Hooked).postRead(() => {
        throw new Error("hook failed");
      });
      expect(() => serializer.read({}, Hooked, { text: "{}" })).toThrow(
        "hook failed",
      );
    });
  });
});
