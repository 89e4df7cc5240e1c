import assert from "node:assert/strict";
import { test, type TestContext } from "node:test";
import { IN_MEMORY_DATABASE, ScanledgerDb } from "../../storage/db.js";
import { Role } from "../../types/domain/access.js";
import { hasAccess, listAccessibleProjectIds } from "../accessResolver.js";

function setup(t: TestContext) {
  const db = new ScanledgerDb({ filename: IN_MEMORY_DATABASE });
  t.after(() => db.close());

  const alice = db.users.create("alice", Role.User);
  const bob = db.users.create("bob", Role.User);
  const root = db.users.create("root", Role.Admin);
  const red = db.teams.create("red");
  const blue = db.teams.create("blue");
  const [p1, p2, p3] = ["api", "web", "batch"].map((name) => db.projects.insert({ name }));
  if (!p1 || !p2 || !p3) throw new Error("projects not created");

  db.teams.addMember(red.id, alice.id);
  db.teams.addMember(blue.id, alice.id);
  db.teams.addMember(blue.id, bob.id);
  db.teams.addProject(red.id, p1.id);
  db.teams.addProject(red.id, p2.id);
  db.teams.addProject(blue.id, p2.id);
  return { db, alice, bob, root, p1, p2, p3 };
}

test("listAccessibleProjectIds unions team projects without duplicates", (t) => {
  const { db, alice, bob, root, p1, p2 } = setup(t);
  assert.deepEqual(listAccessibleProjectIds(db.teams, alice), [p1.id, p2.id]);
  assert.deepEqual(listAccessibleProjectIds(db.teams, bob), [p2.id]);
  assert.deepEqual(listAccessibleProjectIds(db.teams, root), []);
});

test("hasAccess requires a shared team", (t) => {
  const { db, alice, bob, p1, p2, p3 } = setup(t);
  assert.equal(hasAccess(db.teams, alice, p1), true);
  assert.equal(hasAccess(db.teams, bob, p2), true);
  assert.equal(hasAccess(db.teams, bob, p1), false);
  assert.equal(hasAccess(db.teams, alice, p3), false);
});

test("hasAccess grants admins every project", (t) => {
  const { db, root, p1, p3 } = setup(t);
  assert.equal(hasAccess(db.teams, root, p1), true);
  assert.equal(hasAccess(db.teams, root, p3), true);
});

test("access follows membership changes", (t) => {
  const { db, bob, p2 } = setup(t);
  const blue = db.teams.getByName("blue");
  assert.ok(blue);
  db.teams.removeMember(blue.id, bob.id);
  assert.equal(hasAccess(db.teams, bob, p2), false);
  assert.deepEqual(listAccessibleProjectIds(db.teams, bob), []);
});

test("access resolves against any membership lookup", () => {
  const lookup = {
    listTeamIdsForUser: () => [1, 2],
    listTeamIdsForProject: (projectId: number) => (projectId === 7 ? [2] : [3]),
    listProjectIdsForTeams: () => [9, 7, 9, 7]
  };
  const user = { id: 1, role: Role.User };
  assert.deepEqual(listAccessibleProjectIds(lookup, user), [7, 9]);
  assert.equal(hasAccess(lookup, user, { id: 7 }), true);
  assert.equal(hasAccess(lookup, user, { id: 8 }), false);
});
