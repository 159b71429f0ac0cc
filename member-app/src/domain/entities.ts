import { defineEntity, defineSchema, field, relation } from '../../../src/index.js';

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
