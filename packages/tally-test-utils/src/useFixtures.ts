import os from "node:os";
import path from "node:path";
import { randomUUID } from "node:crypto";
import { rm } from "node:fs/promises";
import { afterAll, afterEach } from "@jest/globals";
import {
  mkdirSync,
  existsSync,
  copySync,
  writeFileSync,
  readFileSync,
  realpathSync,
} from "fs-extra";

interface SetupTestFixtures {
  directory: string;
  test?: string;
}

export function setupTestFixtures({ directory, test = "" }: SetupTestFixtures) {
  const fixtures: Array<string> = [];
  // one directory per suite so parallel workers never clean up each other
  const parentDirectory = path.join(
    realpathSync(os.tmpdir()),
    "tally-fixtures",
    randomUUID()
  );

  afterEach(async () => {
    await Promise.all(
      fixtures.map((fixture) =>
        rm(fixture, {
          retryDelay: 50,
          maxRetries: 5,
          recursive: true,
          force: true,
        })
      )
    );
  });

  afterAll(async () => {
    await rm(parentDirectory, {
      retryDelay: 50,
      maxRetries: 5,
      recursive: true,
      force: true,
    });
  });

  const useFixture = ({ fixture }: { fixture: string }) => {
    const testDirectory = path.join(parentDirectory, randomUUID());
    mkdirSync(testDirectory, { recursive: true });
    fixtures.push(testDirectory);

    copySync(path.join(directory, "__fixtures__", test, fixture), testDirectory);

    const getFilePath = (filename: string) => {
      return path.isAbsolute(filename)
        ? filename
        : path.join(testDirectory, filename);
    };

    const read = (filename: string): string | undefined => {
      try {
        return readFileSync(getFilePath(filename), "utf8");
      } catch (e) {
        return undefined;
      }
    };

    const write = (
      filename: string,
      content: string | NodeJS.ArrayBufferView
    ) => {
      writeFileSync(getFilePath(filename), content);
    };

    const exists = (filename: string): boolean => {
      return existsSync(getFilePath(filename));
    };

    return {
      root: testDirectory,
      path: getFilePath,
      read,
      write,
      exists,
    };
  };

  return { useFixture };
}
