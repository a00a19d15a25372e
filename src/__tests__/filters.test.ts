import {
  InvalidFilterError,
  parseAuctionFilter,
  parseOrdering,
} from "../app/filters";
import { errorBody } from "../app/responses";

describe("filters", () => {
  const today = new Date("2024-05-01T12:00:00Z");

  describe("parseAuctionFilter", () => {
    it("should map every parameter onto the filter", () => {
      expect(
        parseAuctionFilter(
          {
            status: "active",
            category: "Electronics",
            start_date: "2024-01-01",
            end_date: "2024-12-31",
            min_price: "10",
            max_price: "99.99",
            search: "oak  table,",
            ordering: "-max_price,quantity",
          },
          today,
        ),
      ).toEqual({
        filter: {
          status: "active",
          category: "Electronics",
          startDate: "2024-01-01",
          endDate: "2024-12-31",
          minPrice: "10",
          maxPrice: "99.99",
          search: ["oak", "table"],
          ordering: [
            { field: "max_price", descending: true },
            { field: "quantity", descending: false },
          ],
        },
        params: {
          status: "active",
          category: "Electronics",
          start_date: "2024-01-01",
          end_date: "2024-12-31",
          min_price: "10",
          max_price: "99.99",
          search: "oak  table,",
          ordering: "-max_price,quantity",
        },
      });
    });

    it("should turn the upcoming status into a start date bound", () => {
      expect(parseAuctionFilter({ status: "Upcoming" }, today)).toEqual({
        filter: { startsAfter: "2024-05-01" },
        params: { status: "Upcoming" },
      });
    });

    it("should ignore empty parameters", () => {
      expect(parseAuctionFilter({ status: "", category: "" }, today)).toEqual({
        filter: {},
        params: {},
      });
    });

    it.each(["2024-13-01", "2024-02-30", "01/05/2024", "2024-5-1"])(
      "should reject the date %s",
      (date) => {
        expect(() => parseAuctionFilter({ end_date: date }, today)).toThrow(
          new InvalidFilterError([
            { field: "end_date", code: "invalid", message: "Enter a valid date." },
          ]),
        );
      },
    );

    it.each(["ten", "1e3", "0x10", "1."])("should reject the price %s", (price) => {
      expect(() => parseAuctionFilter({ max_price: price }, today)).toThrow(
        InvalidFilterError,
      );
    });

    it("should collect every invalid parameter", () => {
      let thrown: unknown;
      try {
        parseAuctionFilter({ status: "sold", category: "Books", min_price: "x" }, today);
      } catch (error) {
        thrown = error;
      }

      expect(thrown).toBeInstanceOf(InvalidFilterError);
      expect(thrown).toMatchObject({
        errors: [
          {
            field: "status",
            code: "invalid_choice",
            message:
              "Select a valid choice. sold is not one of the available choices.",
          },
          {
            field: "category",
            code: "invalid_choice",
            message:
              "Select a valid choice. Books is not one of the available choices.",
          },
          { field: "min_price", code: "invalid", message: "Enter a number." },
        ],
      });
    });
  });

  describe("parseOrdering", () => {
    it("should keep known fields in order and drop the rest", () => {
      expect(parseOrdering(" -start_date, author ,category,-")).toEqual([
        { field: "start_date", descending: true },
        { field: "category", descending: false },
      ]);
    });
  });

  describe("errorBody", () => {
    it("should code a plain message with the response type", () => {
      expect(errorBody(409, "Already exists.")).toEqual({
        type: "conflict",
        errors: [{ code: "conflict", message: "Already exists.", field_name: null }],
      });
    });

    it("should fall back to an unknown type", () => {
      expect(errorBody(418, "No coffee.").type).toBe("unknown");
    });

    it("should carry field names for field errors", () => {
      expect(
        errorBody(400, [
          { field: "start_date", code: "invalid", message: "Enter a valid date." },
        ]),
      ).toEqual({
        type: "bad_request",
        errors: [
          {
            code: "invalid",
            message: "Enter a valid date.",
            field_name: "start_date",
          },
        ],
      });
    });
  });
});
