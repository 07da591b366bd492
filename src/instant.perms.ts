// Docs: https://www.instantdb.com/docs/permissions

import type { InstantRules } from '@instantdb/react';

// Parcels are public and read-only from the browser; the seed script writes with the admin token.
const rules = {
  parcels: {
    allow: {
      view: "true",
      create: "false",
      update: "false",
      delete: "false",
    },
  },
} satisfies InstantRules;

export default rules;
