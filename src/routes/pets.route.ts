import { Router } from "express";
import config from "@/config";
import {
  type BinderOptions,
  CalendarDate,
  RequestBinder,
  UploadedFile,
} from "@/binding";
import { withBinding } from "@/middleware/bindParameters";
import { AppError } from "@/utils/errors/AppError";
import { logger } from "@/utils/logger";

interface Pet {
  id: bigint;
  name: string;
  tags: string[];
  birthday?: CalendarDate;
  photo?: { filename: string; contentType: string; size: number; caption?: string };
}

interface ListPetsParams {
  tags?: string[];
  limit?: number;
}

interface GetPetParams {
  id?: bigint;
  requestId?: string;
}

interface CreatePetParams {
  pet?: { name?: unknown; tags?: unknown; birthday?: unknown };
}

interface UploadPhotoParams {
  id?: bigint;
  photo?: UploadedFile;
  caption?: string;
}

const binderOptions: BinderOptions = {
  bodyLimit: config.BODY_LIMIT,
  maxFileSize: config.MAX_FILE_SIZE,
  maxFieldSize: config.MAX_FIELD_SIZE,
};

const petId = {
  name: "id",
  in: "path",
  type: "integer",
  format: "int64",
  required: true,
} as const;

const listPets = new RequestBinder<ListPetsParams>(
  {
    tags: {
      name: "tags",
      in: "query",
      type: "array",
      items: { type: "string" },
      collectionFormat: "csv",
    },
    limit: { name: "limit", in: "query", type: "integer", format: "int32", default: 20 },
  },
  binderOptions,
);

const getPet = new RequestBinder<GetPetParams>(
  {
    id: petId,
    requestId: { name: "X-Request-Id", in: "header", type: "string" },
  },
  binderOptions,
);

const createPet = new RequestBinder<CreatePetParams>(
  {
    pet: {
      name: "pet",
      in: "body",
      required: true,
      schema: {
        type: "object",
        required: ["name"],
        properties: {
          name: { type: "string" },
          tags: { type: "array", items: { type: "string" } },
          birthday: { type: "string", format: "date" },
        },
      },
    },
  },
  binderOptions,
);

const uploadPhoto = new RequestBinder<UploadPhotoParams>(
  {
    id: petId,
    photo: { name: "photo", in: "file", required: true },
    caption: { name: "caption", in: "form", type: "string" },
  },
  binderOptions,
);

// demo storage; restarts empty
const pets = new Map<bigint, Pet>();
let nextId = 1n;

function findPet(id: bigint | undefined): Pet {
  const pet = id === undefined ? undefined : pets.get(id);
  if (!pet) throw new AppError(`Pet ${String(id)} not found`, 404);
  return pet;
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === "string") : [];
}

const router = Router();

router.get(
  "/pets",
  withBinding(
    listPets,
    (): ListPetsParams => ({}),
    (params, _req, res) => {
      const wanted = params.tags ?? [];
      const matching = [...pets.values()].filter((pet) =>
        wanted.every((tag) => pet.tags.includes(tag)),
      );
      res.json({ pets: matching.slice(0, params.limit) });
    },
  ),
);

router.get(
  "/pets/:id",
  withBinding(
    getPet,
    (): GetPetParams => ({}),
    (params, _req, res) => {
      logger.debug("pet lookup", { id: params.id, requestId: params.requestId });
      res.json(findPet(params.id));
    },
  ),
);

router.post(
  "/pets",
  withBinding(
    createPet,
    (): CreatePetParams => ({}),
    (params, _req, res) => {
      const body = params.pet ?? {};
      const pet: Pet = {
        id: nextId++,
        name: String(body.name),
        tags: stringList(body.tags),
        ...(body.birthday instanceof CalendarDate ? { birthday: body.birthday } : {}),
      };
      pets.set(pet.id, pet);
      res.status(201).json(pet);
    },
  ),
);

router.post(
  "/pets/:id/photo",
  withBinding(
    uploadPhoto,
    (): UploadPhotoParams => ({}),
    (params, _req, res) => {
      const pet = findPet(params.id);
      const { photo } = params;
      if (!(photo instanceof UploadedFile)) {
        throw new AppError("photo is required", 400);
      }
      pet.photo = {
        filename: photo.filename,
        contentType: photo.contentType,
        size: photo.size,
        ...(params.caption !== undefined ? { caption: params.caption } : {}),
      };
      res.status(201).json(pet);
    },
  ),
);

export default router;
