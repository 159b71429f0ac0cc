import { defineEntity, field, relation } from '../../src/schema/entity.js';
import { defineSchema } from '../../src/schema/schema.js';
import { MemoryDataSource } from '../../src/store/memory-data-source.js';

export const Team = defineEntity({
  name: 'Team',
  fields: {
    id: field.number(),
    name: field.string(),
    members: relation.oneToMany('Member', 'team'),
  },
});

export const Member = defineEntity({
  name: 'Member',
  fields: {
    id: field.number(),
    username: field.string().nullable(),
    age: field.number(),
    team: relation.manyToOne('Team'),
  },
});

export const schema = defineSchema([Team, Member]);

/**
 * teamA: member1 (10), member2 (20)
 * teamB: member3 (30), member4 (40)
 */
export function seededSource(): MemoryDataSource {
  const source = new MemoryDataSource({ schema });
  const teamA = source.insert(Team, { name: 'teamA' });
  const teamB = source.insert(Team, { name: 'teamB' });
  source.insert(Member, { username: 'member1', age: 10, team: teamA });
  source.insert(Member, { username: 'member2', age: 20, team: teamA });
  source.insert(Member, { username: 'member3', age: 30, team: teamB });
  source.insert(Member, { username: 'member4', age: 40, team: teamB });
  return source;
}
