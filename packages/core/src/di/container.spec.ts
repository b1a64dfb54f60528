import test from "node:test";
import assert from "node:assert/strict";
import { Container } from "./container";
import { Inject, Injectable, provideFromClass } from "./decorators";
import { createToken } from "./types";

const GREETING = createToken<string>("test.greeting");

@Injectable()
class Greeter {
  constructor(@Inject(GREETING) private readonly greeting: string) {}

  greet(name: string) {
    return `${this.greeting}, ${name}`;
  }
}

test("resolves class providers through @Inject tokens", () => {
  const container = new Container({
    providers: [{ token: GREETING, useValue: "Hello" }, provideFromClass(Greeter)],
  });
  assert.equal(container.resolve(Greeter).greet("shelf"), "Hello, shelf");
});

test("singletons are shared with request containers", () => {
  const container = new Container({ providers: [provideFromClass(Greeter), { token: GREETING, useValue: "Hi" }] });
  const request = container.beginRequest();
  assert.equal(request.resolve(Greeter), container.resolve(Greeter));
});

test("request scoped tokens only resolve inside a request", () => {
  const REQUEST_ID = createToken<string>("test.request-id");
  const container = new Container();
  assert.throws(() => container.resolve(REQUEST_ID), /No provider found/);

  const request = container.beginRequest([{ token: REQUEST_ID, useValue: "req-1", scope: "request" }]);
  assert.equal(request.resolve(REQUEST_ID), "req-1");
});

test("re-registering a token replaces the cached singleton", () => {
  const container = new Container({ providers: [{ token: GREETING, useValue: "Hello" }] });
  assert.equal(container.resolve(GREETING), "Hello");
  container.register({ token: GREETING, useValue: "Howdy" });
  assert.equal(container.resolve(GREETING), "Howdy");
});

test("missing @Inject metadata is reported with the class name", () => {
  class Untagged {
    constructor(readonly value: string) {}
  }
  assert.throws(() => provideFromClass(Untagged), /Untagged takes 1 constructor arguments; add @Inject\(\) to parameter 0/);
});
