import { describe, expect, it } from "vitest";
import { formatCreatedAt, formatStatistics, formatTaskLine, toTaskDto } from "./TaskDto.js";

describe("formatCreatedAt", () => {
  it("renders local time to the minute", () => {
    expect(formatCreatedAt(new Date(2024, 0, 9, 7, 5, 59).toISOString())).toBe("2024-01-09 07:05");
  });

  it("renders the last minute of the year", () => {
    const instant = new Date(2023, 11, 31, 23, 59);
    expect(formatCreatedAt(instant.toISOString())).toBe("2023-12-31 23:59");
  });
});

describe("task formatting", () => {
  const createdAt = new Date(2024, 4, 1, 18, 30).toISOString();

  it("adds the display timestamp to the dto", () => {
    expect(toTaskDto({ id: 3, text: "Read book", completed: false, createdAt })).toEqual({
      id: 3,
      text: "Read book",
      completed: false,
      createdAt,
      createdAtDisplay: "2024-05-01 18:30",
    });
  });

  it("marks completed tasks in list lines", () => {
    expect(formatTaskLine({ id: 1, text: "Buy milk", completed: true, createdAt })).toBe(
      "- #1 [x] Buy milk (created 2024-05-01 18:30)"
    );
    expect(formatTaskLine({ id: 2, text: "Walk dog", completed: false, createdAt })).toBe(
      "- #2 [ ] Walk dog (created 2024-05-01 18:30)"
    );
  });

  it("renders statistics", () => {
    expect(formatStatistics({ total: 2, completed: 1, pending: 1 })).toBe(
      "Total: 2 | Completed: 1 | Pending: 1"
    );
  });
});
