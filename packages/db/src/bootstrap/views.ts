export const requirementSectionsViewDdl = `
CREATE OR REPLACE VIEW requirement_sections_v AS
SELECT DISTINCT rtm.requirement_id, s.section_id, s.section_name
FROM requirement_testcase_map rtm
JOIN testcase_section_map tsm ON tsm.testcase_id = rtm.testcase_id
JOIN sections s ON s.section_id = tsm.section_id;`
