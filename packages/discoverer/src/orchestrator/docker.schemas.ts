/**
 * Typebox schemas for the Docker Engine API payloads we read.
 *
 * Only the fields discovery needs are declared; everything else the
 * Engine returns passes through unchecked.
 */

import { Type, type Static } from "@sinclair/typebox";

const Labels = Type.Record(Type.String(), Type.String());

// ---------------------------------------------------------------------------
// GET /services, GET /services/{id}
// ---------------------------------------------------------------------------

export const SwarmService = Type.Object({
  ID: Type.String(),
  Spec: Type.Object({
    Name: Type.String(),
    Labels: Type.Optional(Labels),
    TaskTemplate: Type.Optional(
      Type.Object({
        ContainerSpec: Type.Optional(
          Type.Object({
            Labels: Type.Optional(Labels),
            Env: Type.Optional(Type.Array(Type.String())),
          }),
        ),
      }),
    ),
  }),
});

export type SwarmService = Static<typeof SwarmService>;

export const SwarmServiceList = Type.Array(SwarmService);

// ---------------------------------------------------------------------------
// GET /tasks
// ---------------------------------------------------------------------------

export const SwarmTask = Type.Object({
  ID: Type.String(),
  ServiceID: Type.String(),
  DesiredState: Type.String(),
  NetworksAttachments: Type.Optional(
    Type.Array(
      Type.Object({
        Network: Type.Object({
          Spec: Type.Object({ Name: Type.String() }),
        }),
        Addresses: Type.Optional(Type.Array(Type.String())),
      }),
    ),
  ),
  Status: Type.Optional(
    Type.Object({
      ContainerStatus: Type.Optional(
        Type.Object({
          ContainerID: Type.Optional(Type.String()),
        }),
      ),
    }),
  ),
});

export type SwarmTask = Static<typeof SwarmTask>;

export const SwarmTaskList = Type.Array(SwarmTask);
