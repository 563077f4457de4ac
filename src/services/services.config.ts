import { createActions } from "../engine/create-action.js";
import { createServices } from "../engine/create-service.js";
import { addTaskAction } from "./tasks/add.js";
import { deleteTaskAction } from "./tasks/delete.js";
import { getTaskAction } from "./tasks/get.js";
import { listTasksAction } from "./tasks/list.js";
import { markTaskAction } from "./tasks/mark.js";
import type { TaskOutcome } from "./tasks/types.js";
import { updateTaskAction } from "./tasks/update.js";

export const services = createServices<TaskOutcome>([
  {
    name: "tasks",
    description: "Task tracking with add, update, delete, mark and list",
    actions: createActions([
      addTaskAction,
      updateTaskAction,
      deleteTaskAction,
      markTaskAction,
      listTasksAction,
      getTaskAction,
    ]),
  },
]);
