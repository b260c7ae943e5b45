import { describe, it, expect } from "vitest";
import { validateSettings } from "../src/config/settings.js";

const DATA_DIR = "/var/lib/syncthing";

describe("Declared settings", () => {
    it("should treat missing settings as empty", () => {
        const settings = validateSettings(undefined, DATA_DIR);
        expect(settings.global).toEqual({});
        expect(settings.devices.size).toBe(0);
        expect(settings.folders.size).toBe(0);
    });

    it("should pass unknown top-level keys through", () => {
        const settings = validateSettings(
            { gui: { theme: "black" }, options: { localAnnounceEnabled: false } },
            DATA_DIR,
        );
        expect(settings.global).toEqual({
            gui: { theme: "black" },
            options: { localAnnounceEnabled: false },
        });
    });

    it("should type-check known global options", () => {
        expect(() => validateSettings({ options: { maxSendKbps: "fast" } }, DATA_DIR)).toThrow(
            "settings.options.maxSendKbps must be an integer",
        );
        expect(() => validateSettings({ options: { databaseTuning: "huge" } }, DATA_DIR)).toThrow(
            "settings.options.databaseTuning must be one of: auto, large, small",
        );
    });

    it("should accept unknown global options of any shape", () => {
        const settings = validateSettings(
            { options: { minHomeDiskFree: { unit: "%", value: 1 } } },
            DATA_DIR,
        );
        expect(settings.global.options).toEqual({ minHomeDiskFree: { unit: "%", value: 1 } });
    });

    describe("devices", () => {
        it("should apply device defaults", () => {
            const settings = validateSettings({ devices: { bigbox: { id: "ABC123" } } }, DATA_DIR);
            expect(settings.devices.get("bigbox")).toEqual({
                name: "bigbox",
                id: "ABC123",
                addresses: [],
                introducer: false,
                autoAcceptFolders: false,
                extra: {},
            });
        });

        it("should keep extra device fields", () => {
            const settings = validateSettings(
                { devices: { bigbox: { id: "ABC123", name: "Big Box", compression: "always" } } },
                DATA_DIR,
            );
            const device = settings.devices.get("bigbox");
            expect(device?.name).toBe("Big Box");
            expect(device?.extra).toEqual({ compression: "always" });
        });

        it("should require a device id", () => {
            expect(() => validateSettings({ devices: { bigbox: {} } }, DATA_DIR)).toThrow(
                "settings.devices.bigbox.id must be a non-empty string",
            );
        });

        it("should reject non-string addresses", () => {
            expect(() =>
                validateSettings({ devices: { bigbox: { id: "ABC123", addresses: [42] } } }, DATA_DIR),
            ).toThrow("settings.devices.bigbox.addresses[0] must be a non-empty string");
        });

        it("should keep declaration order", () => {
            const settings = validateSettings(
                { devices: { zeta: { id: "Z" }, alpha: { id: "A" } } },
                DATA_DIR,
            );
            expect([...settings.devices.keys()]).toEqual(["zeta", "alpha"]);
        });
    });

    describe("folders", () => {
        it("should default id, label and path from the name", () => {
            const settings = validateSettings({ folders: { docs: {} } }, DATA_DIR);
            const folder = settings.folders.get("docs");
            expect(folder?.enable).toBe(true);
            expect(folder?.id).toBe("docs");
            expect(folder?.label).toBe("docs");
            expect(folder?.path).toBe("/var/lib/syncthing/docs");
            expect(folder?.devices).toEqual([]);
            expect(folder?.versioning).toBeNull();
        });

        it("should fill tuning defaults", () => {
            const settings = validateSettings({ folders: { docs: {} } }, DATA_DIR);
            const options = settings.folders.get("docs")?.options;
            expect(options?.rescanInterval).toBe(3600);
            expect(options?.type).toBe("sendreceive");
            expect(options?.watch).toBe(true);
            expect(options?.maxConflicts).toBe(-1);
            expect(options?.markerName).toBe(".stfolder");
            expect(options?.blockPullOrder).toBe("standard");
        });

        it("should keep explicit tuning values and extra fields", () => {
            const settings = validateSettings(
                { folders: { docs: { type: "sendonly", rescanInterval: 60, paused: false } } },
                DATA_DIR,
            );
            const options = settings.folders.get("docs")?.options;
            expect(options?.type).toBe("sendonly");
            expect(options?.rescanInterval).toBe(60);
            expect(options?.paused).toBe(false);
        });

        it("should reject a bad folder type", () => {
            expect(() => validateSettings({ folders: { docs: { type: "mirror" } } }, DATA_DIR)).toThrow(
                "settings.folders.docs.type must be one of: sendreceive, sendonly, receiveonly, receiveencrypted",
            );
        });

        it("should accept paths in the home directory", () => {
            const settings = validateSettings({ folders: { docs: { path: "~/docs" } } }, DATA_DIR);
            expect(settings.folders.get("docs")?.path).toBe("~/docs");
        });

        it("should reject relative paths", () => {
            expect(() => validateSettings({ folders: { docs: { path: "docs" } } }, DATA_DIR)).toThrow(
                'settings.folders.docs.path must be absolute or start with "~/"',
            );
        });

        it("should reject folders that name an undeclared device", () => {
            expect(() =>
                validateSettings({ folders: { docs: { devices: ["bigbox"] } } }, DATA_DIR),
            ).toThrow('settings.folders.docs.devices[0] references unknown device "bigbox"');
        });

        it("should accept structured device references", () => {
            const settings = validateSettings(
                { folders: { docs: { devices: [{ deviceId: "XYZ", encryptionPassword: "test-secret" }] } } },
                DATA_DIR,
            );
            expect(settings.folders.get("docs")?.devices).toEqual([
                { deviceId: "XYZ", encryptionPassword: "test-secret" },
            ]);
        });

        it("should validate versioning", () => {
            const settings = validateSettings(
                { folders: { docs: { versioning: { type: "simple", params: { keep: 10 } } } } },
                DATA_DIR,
            );
            expect(settings.folders.get("docs")?.versioning).toEqual({
                type: "simple",
                fsPath: "",
                params: { keep: "10" },
            });
        });

        it("should reject an unknown versioning type", () => {
            expect(() =>
                validateSettings({ folders: { docs: { versioning: { type: "git" } } } }, DATA_DIR),
            ).toThrow("settings.folders.docs.versioning.type must be one of: external, simple, staggered, trashcan");
        });
    });
});
